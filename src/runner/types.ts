import type { GcpClients } from '../gcp/index.js';
import type { StepLogger } from '../lib/utils/logger.js';

/** Everything a step may touch; nothing is reached through module state */
export interface StepContext {
  clients: GcpClients;
  log: StepLogger;
  /** Fixed delay between operation-status polls */
  pollIntervalMs: number;
}

/** A plan step bound to its target with validated arguments */
export interface ResolvedStep {
  name: string;
  target: string;
  invoke(ctx: StepContext): Promise<unknown>;
}

export type RunStatus = 'completed' | 'stopped' | 'interrupted';

/** Result of one pass over the step list */
export interface RunOutcome {
  status: RunStatus;
  /** Steps invoked successfully during this run */
  ran: string[];
  /** Steps found already completed */
  skipped: string[];
  failed: { step: string; error: unknown } | null;
  /** Steps not completed when the run ended, in order */
  remaining: string[];
}
