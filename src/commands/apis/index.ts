import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { EXIT } from '../../lib/exit-codes.js';
import { createGcpClients } from '../../gcp/index.js';
import { createStepLogger } from '../../lib/utils/logger.js';
import { parsePollInterval } from '../../config.js';
import { enableApis, REQUIRED_APIS } from '../../steps/enable-apis.js';

const listCommand = new Command('list')
  .description('List the APIs enabled on a project')
  .argument('<project>', 'Project id')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (project: string, options: { json?: boolean }) => {
      const services = await createGcpClients().serviceUsage.listEnabled(project);

      if (options.json) {
        console.log(JSON.stringify(services));
        return;
      }
      console.log(`Enabled APIs in ${chalk.bold(project)} (${services.length}):`);
      for (const s of services) {
        console.log(`  ${s.api}${s.title ? chalk.dim(`  ${s.title}`) : ''}`);
      }
    }),
  );

const enableCommand = new Command('enable')
  .description('Enable APIs on a project (default: the standard API list)')
  .argument('<project>', 'Project id')
  .argument('[apis...]', 'Service names such as run.googleapis.com')
  .option('--poll-interval <sec>', 'Seconds between operation-status polls')
  .action(
    withErrorHandler(async (project: string, apis: string[], options: { pollInterval?: string }) => {
      const result = await enableApis(
        createGcpClients(),
        project,
        apis.length > 0 ? apis : REQUIRED_APIS,
        {
          log: createStepLogger('apis'),
          pollIntervalMs: parsePollInterval(options.pollInterval ?? process.env.PROVISION_POLL_INTERVAL),
        },
      );

      console.log(
        `${result.enabled.length} enabled, ${result.skipped.length} already enabled, ${result.failed.length} failed`,
      );
      if (result.failed.length > 0) {
        process.exit(EXIT.STOPPED);
      }
    }),
  );

export const apisCommand = new Command('apis')
  .description('Inspect or enable project APIs outside a plan')
  .addCommand(listCommand)
  .addCommand(enableCommand);
