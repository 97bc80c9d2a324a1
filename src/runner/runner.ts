import chalk from 'chalk';
import type { GcpClients } from '../gcp/index.js';
import type { CheckpointStore } from '../plan/state.js';
import { recordEvent, type EventWriterOptions, type ProvisionEventInput } from '../integration/ledger.js';
import { createStepLogger, type StepLogger } from '../lib/utils/logger.js';
import { formatDuration } from '../lib/utils/format.js';
import { errorMessage } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { pendingSteps } from './find-next.js';
import { setStepInFlight } from './shutdown.js';
import type { ResolvedStep, RunOutcome } from './types.js';

export interface RunStepsOptions {
  planName: string;
  steps: ResolvedStep[];
  store: CheckpointStore;
  clients: GcpClients;
  pollIntervalMs: number;
  /** JSONL ledger; omitted means no events are written */
  events?: EventWriterOptions;
  /** Polled before each step; true stops the run between steps */
  isInterrupted?: () => boolean;
  createLogger?: (stepName: string) => StepLogger;
}

/**
 * Main runner loop. Executes steps strictly in order.
 *
 * Completed steps are skipped. After each successful step the checkpoint is
 * persisted before the next one starts. The first failing step stops the run
 * and stays unmarked, so re-invoking resumes exactly there.
 */
export async function runSteps(options: RunStepsOptions): Promise<RunOutcome> {
  const { planName, steps, store } = options;
  const createLogger = options.createLogger ?? createStepLogger;
  const emit = (event: ProvisionEventInput): void => {
    if (options.events) recordEvent(options.events, event);
  };
  const base = { plan_name: planName, scope: store.scope };

  // 1. Load state once
  const state = store.load();
  const runStartMs = Date.now();
  const outcome: RunOutcome = { status: 'completed', ran: [], skipped: [], failed: null, remaining: [] };

  debug('runner', `loaded ${state.completed.length} completed step(s) from ${store.path}`);
  emit({ ...base, type: 'run:start', step_count: steps.length, pending: pendingSteps(steps, state).length });

  // 2. Runner loop
  for (const step of steps) {
    if (options.isInterrupted?.()) {
      outcome.status = 'interrupted';
      console.log('Stopped before the next step. Re-run to resume.');
      break;
    }

    if (state.completed.includes(step.name)) {
      console.log(chalk.dim(`⏭ Skipping ${step.name} (already done)`));
      outcome.skipped.push(step.name);
      emit({ ...base, type: 'step:skipped', step: step.name });
      continue;
    }

    console.log(`\n▶ Running ${step.name} …`);
    const startMs = Date.now();

    setStepInFlight(true);
    try {
      await step.invoke({
        clients: options.clients,
        log: createLogger(step.name),
        pollIntervalMs: options.pollIntervalMs,
      });
    } catch (err) {
      const elapsed = Date.now() - startMs;
      console.error(chalk.red(`✗ Error in ${step.name}: ${errorMessage(err)}`));
      console.error(err instanceof Error && err.stack ? err.stack : String(err));
      console.error('Stopping execution. Re-run to resume.');

      outcome.status = 'stopped';
      outcome.failed = { step: step.name, error: err };
      emit({ ...base, type: 'step:failed', step: step.name, duration_ms: elapsed, error: errorMessage(err) });
      break;
    } finally {
      setStepInFlight(false);
    }

    // Persist immediately: this is the crash-safety boundary
    state.completed.push(step.name);
    store.save(state);
    outcome.ran.push(step.name);

    const elapsed = Date.now() - startMs;
    console.log(chalk.green(`✓ ${step.name} done (${formatDuration(elapsed)})`));
    emit({ ...base, type: 'step:passed', step: step.name, duration_ms: elapsed });
  }

  // 3. Run-level final event
  outcome.remaining = pendingSteps(steps, state);

  if (outcome.status === 'completed') {
    const totalMs = Date.now() - runStartMs;
    console.log(chalk.green(`\n✓ Plan "${planName}" completed (${formatDuration(totalMs)})`));
    emit({
      ...base,
      type: 'run:completed',
      ran: outcome.ran.length,
      skipped: outcome.skipped.length,
      duration_ms: totalMs,
    });
  } else {
    emit({
      ...base,
      type: 'run:stopped',
      reason: outcome.status === 'interrupted' ? 'interrupted' : 'failed',
      failed_step: outcome.failed?.step ?? null,
      remaining: outcome.remaining,
    });
  }

  return outcome;
}
