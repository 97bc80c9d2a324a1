import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import YAML from 'yaml';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { ProvisionError, ErrorCode } from '../../lib/errors.js';
import { buildDefaultPlan, type DefaultPlanParams } from '../../plan/default-plan.js';
import { parsePlanYaml, resolvePlan } from '../../plan/parser.js';
import { createStepRegistry } from '../../steps/index.js';
import { DEFAULT_PLAN_FILE } from '../../config.js';

/** YAML for the default plan, validated the same way `run` would load it */
export function renderDefaultPlan(params: DefaultPlanParams): string {
  const content = YAML.stringify(buildDefaultPlan(params));
  resolvePlan(parsePlanYaml(content, {}), createStepRegistry());
  return content;
}

export const initCommand = new Command('init')
  .description('Write a provision.yaml with the standard environment steps')
  .option('--region <code>', 'Region code used in the project id', 'us')
  .option('--env <name>', 'Environment (dev, uat, prod, ...)', 'dev')
  .option('--app <name>', 'Application name', 'app')
  .option('--lob <name>', 'Line of business', 'ops')
  .option('--location <region>', 'GCP region for regional resources', 'us-central1')
  .option('-o, --output <file>', 'Where to write the plan', DEFAULT_PLAN_FILE)
  .option('--force', 'Overwrite an existing file')
  .action(
    withErrorHandler(async (options: DefaultPlanParams & { output: string; force?: boolean }) => {
      const target = resolve(options.output);
      if (existsSync(target) && !options.force) {
        throw new ProvisionError(
          ErrorCode.INVALID_CONFIG,
          `${options.output} already exists`,
          'Pass --force to overwrite it',
        );
      }

      const content = renderDefaultPlan({
        region: options.region,
        env: options.env,
        app: options.app,
        lob: options.lob,
        location: options.location,
      });
      writeFileSync(target, content);

      console.log(chalk.green(`✓ Wrote ${options.output}`));
      console.log(`  Run: provision run ${options.output === DEFAULT_PLAN_FILE ? '' : options.output}`.trimEnd());
    }),
  );
