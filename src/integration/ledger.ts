import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { formatDuration } from '../lib/utils/format.js';
import { debug } from '../lib/utils/debug.js';

// ── Event types ──

interface EventBase {
  plan_name: string;
  scope: string;
  seq: number;
  ts: string;
}

export type ProvisionEvent =
  | (EventBase & { type: 'run:start'; step_count: number; pending: number })
  | (EventBase & { type: 'step:skipped'; step: string })
  | (EventBase & { type: 'step:passed'; step: string; duration_ms: number })
  | (EventBase & { type: 'step:failed'; step: string; duration_ms: number; error: string })
  | (EventBase & { type: 'run:completed'; ran: number; skipped: number; duration_ms: number })
  | (EventBase & {
      type: 'run:stopped';
      reason: 'failed' | 'interrupted';
      failed_step: string | null;
      remaining: string[];
    });

// ── Event writer ──

export interface EventWriterOptions {
  jsonLogPath: string;
}

let eventSequence = 0;

/** Reset sequence counter (for testing) */
export function resetEventSequence(): void {
  eventSequence = 0;
}

/** Distributive Omit for union types */
type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;

export type ProvisionEventInput = DistributiveOmit<ProvisionEvent, 'seq' | 'ts'>;

/** Append an event to the JSONL ledger */
export function recordEvent(options: EventWriterOptions, event: ProvisionEventInput): void {
  const fullEvent: ProvisionEvent = {
    ...event,
    seq: eventSequence++,
    ts: new Date().toISOString(),
  };

  mkdirSync(dirname(options.jsonLogPath), { recursive: true });
  appendFileSync(options.jsonLogPath, JSON.stringify(fullEvent) + '\n');
  debug('ledger', formatEventMessage(fullEvent));
}

// ── Message formatting ──

export function formatEventMessage(event: ProvisionEvent): string {
  const where = `${event.plan_name}[${event.scope}]`;

  switch (event.type) {
    case 'run:start':
      return `run:start ${where} (${event.pending}/${event.step_count} steps pending)`;

    case 'step:skipped':
      return `step:skipped ${where}/${event.step}`;

    case 'step:passed':
      return `step:passed ${where}/${event.step} (${formatDuration(event.duration_ms)})`;

    case 'step:failed':
      return `step:failed ${where}/${event.step}: ${event.error}`;

    case 'run:completed':
      return `run:completed ${where} (${formatDuration(event.duration_ms)}, ${event.ran} ran, ${event.skipped} skipped)`;

    case 'run:stopped':
      return event.failed_step
        ? `run:stopped ${where} at ${event.failed_step} (${event.remaining.length} remaining)`
        : `run:stopped ${where} by ${event.reason} (${event.remaining.length} remaining)`;
  }
}
