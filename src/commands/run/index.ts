import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { EXIT } from '../../lib/exit-codes.js';
import { createGcpClients } from '../../gcp/index.js';
import { runSteps } from '../../runner/runner.js';
import { pendingSteps } from '../../runner/find-next.js';
import { installShutdownHandlers, isShuttingDown } from '../../runner/shutdown.js';
import { errorMessage } from '../../lib/errors.js';
import { loadRunContext } from '../context.js';

export const runCommand = new Command('run')
  .description('Run a provisioning plan (or resume where it stopped)')
  .argument('[plan-file]', 'Path to plan YAML file (default: provision.yaml)')
  .option('--state <file>', 'Checkpoint file (default: orchestration_state.json)')
  .option('--scope <key>', 'Track progress under this scope key')
  .option('--poll-interval <sec>', 'Seconds between operation-status polls')
  .option('--dry-run', 'Validate the plan and show what would run')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (planFile: string | undefined, options: {
      state?: string;
      scope?: string;
      pollInterval?: string;
      dryRun?: boolean;
      json?: boolean;
    }) => {
      const { plan, steps, config, store } = loadRunContext(planFile, options);
      const state = store.load();
      const pending = pendingSteps(steps, state);

      // --dry-run: validate only
      if (options.dryRun) {
        if (options.json) {
          console.log(JSON.stringify({
            plan: plan.name,
            scope: store.scope,
            state_file: config.stateFile,
            steps: steps.map((s) => ({
              name: s.name,
              target: s.target,
              done: state.completed.includes(s.name),
            })),
            pending,
            valid: true,
          }));
        } else {
          console.log(chalk.green(`✓ Plan "${plan.name}" is valid`));
          console.log(`  ${steps.length} steps, ${pending.length} pending (scope: ${store.scope})`);
          console.log(`  Execution order: ${steps.map((s) => s.name).join(' → ')}`);
        }
        return;
      }

      // Print overview
      if (!options.json) {
        console.log(`Plan: ${chalk.bold(plan.name)} ${chalk.dim(`(scope: ${store.scope})`)}`);
        console.log(`  ${steps.length} steps, ${pending.length} pending`);
        console.log(chalk.dim(`  checkpoint: ${config.stateFile}`));
      }

      installShutdownHandlers();

      const outcome = await runSteps({
        planName: plan.name,
        steps,
        store,
        clients: createGcpClients(),
        pollIntervalMs: config.pollIntervalMs,
        events: { jsonLogPath: config.eventsPath },
        isInterrupted: isShuttingDown,
      });

      if (options.json) {
        console.log(JSON.stringify({
          plan: plan.name,
          scope: store.scope,
          status: outcome.status,
          ran: outcome.ran,
          skipped: outcome.skipped,
          failed: outcome.failed
            ? { step: outcome.failed.step, error: errorMessage(outcome.failed.error) }
            : null,
          remaining: outcome.remaining,
        }));
      }

      // Exit codes: a stopped run must not look like success
      switch (outcome.status) {
        case 'completed':
          process.exit(EXIT.SUCCESS);
          break;
        case 'stopped':
          process.exit(EXIT.STOPPED);
          break;
        case 'interrupted':
          process.exit(EXIT.INTERRUPTED);
          break;
      }
    }),
  );
