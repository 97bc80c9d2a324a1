import { z } from 'zod';
import { ProvisionError, ErrorCode } from '../lib/errors.js';

/** Polling interval used when a step does not set one (2 seconds) */
export const DEFAULT_POLL_INTERVAL_MS = 2000;

// ── Operation shapes ──

const operationError = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
});

/** google.longrunning.Operation (Service Usage, Resource Manager, Cloud Run) */
export const longRunningOperationSchema = z.object({
  name: z.string().optional(),
  done: z.boolean().optional(),
  error: operationError.optional(),
});

export type LongRunningOperation = z.infer<typeof longRunningOperationSchema>;

/** compute#operation */
export const computeOperationSchema = z.object({
  name: z.string(),
  status: z.enum(['PENDING', 'RUNNING', 'DONE']),
  error: z.object({ errors: z.array(operationError).default([]) }).optional(),
});

export type ComputeOperation = z.infer<typeof computeOperationSchema>;

/** Normalized progress of any operation kind */
export interface OperationStatus {
  done: boolean;
  error: string | null;
}

export function longRunningStatus(op: LongRunningOperation): OperationStatus {
  return {
    done: op.done === true,
    error: op.error ? op.error.message ?? `code ${op.error.code ?? '?'}` : null,
  };
}

export function computeStatus(op: ComputeOperation): OperationStatus {
  const messages = op.error?.errors.map((e) => e.message ?? `code ${e.code ?? '?'}`) ?? [];
  return {
    done: op.status === 'DONE',
    error: messages.length > 0 ? messages.join('; ') : null,
  };
}

// ── Sleep ──

/** Sleep for the given duration in ms. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

// ── Poll loop ──

export interface WaitOptions {
  /** Fixed delay between polls */
  intervalMs: number;
  /** Label used in the failure message */
  description: string;
}

/**
 * Poll an operation at a fixed interval until it reports completion.
 * No timeout: the loop ends only when the operation is done or a poll throws.
 * Returns the number of polls made.
 */
export async function waitForOperation(
  initial: OperationStatus,
  poll: () => Promise<OperationStatus>,
  options: WaitOptions,
): Promise<number> {
  let status = initial;
  let polls = 0;

  while (!status.done) {
    await sleep(options.intervalMs);
    status = await poll();
    polls++;
  }

  if (status.error) {
    throw new ProvisionError(
      ErrorCode.OPERATION_FAILED,
      `${options.description} failed: ${status.error}`,
    );
  }

  return polls;
}
