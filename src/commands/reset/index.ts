import { Command } from 'commander';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { resolveRunConfig } from '../../config.js';
import { openCheckpointStore, removeCompleted } from '../../plan/state.js';
import { ProvisionError, ErrorCode } from '../../lib/errors.js';
import { loadOptionalPlan } from '../context.js';

export interface ResetOptions {
  all?: boolean;
  plan?: string;
  state?: string;
  scope?: string;
}

/** Remove one step (or every step) from the checkpoint of the selected scope */
export function resetCheckpoint(
  stepName: string | undefined,
  options: ResetOptions,
): { scope: string; removed: string[] } {
  if (!stepName && !options.all) {
    throw new ProvisionError(
      ErrorCode.MISSING_ARGUMENT,
      'Name a step to reset, or pass --all',
      'Run: provision status (to see completed steps)',
    );
  }

  const { plan, planFile } = loadOptionalPlan(options.plan);
  if (stepName && plan && !plan.steps.some((s) => s.name === stepName)) {
    throw new ProvisionError(
      ErrorCode.STEP_NOT_FOUND,
      `Plan "${plan.name}" has no step "${stepName}"`,
      `Steps: ${plan.steps.map((s) => s.name).join(', ')}`,
    );
  }

  const config = resolveRunConfig(plan, planFile, options);
  const store = openCheckpointStore(config.stateFile, config.scope);
  const removed = removeCompleted(store, options.all || !stepName ? 'all' : [stepName]);
  return { scope: store.scope, removed };
}

export const resetCommand = new Command('reset')
  .description('Forget a completed step so the next run executes it again')
  .argument('[step]', 'Step name to reset')
  .option('--all', 'Reset every step')
  .option('--plan <file>', 'Plan YAML file (default: provision.yaml)')
  .option('--state <file>', 'Checkpoint file (default: orchestration_state.json)')
  .option('--scope <key>', 'Scope key to reset')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (stepName: string | undefined, options: ResetOptions & { json?: boolean }) => {
      const { scope, removed } = resetCheckpoint(stepName, options);

      if (options.json) {
        console.log(JSON.stringify({ action: 'reset', scope, removed }));
        return;
      }
      if (removed.length === 0) {
        console.log(stepName && !options.all
          ? `Step "${stepName}" is not marked complete; nothing to reset`
          : 'No completed steps; nothing to reset');
        return;
      }
      console.log(`⟲ Reset ${removed.join(', ')} (scope: ${scope})`);
      console.log('  Run: provision run (to execute them again)');
    }),
  );
