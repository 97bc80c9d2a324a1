import { dirname, join, resolve } from 'node:path';
import { ProvisionError, ErrorCode } from './lib/errors.js';
import { DEFAULT_POLL_INTERVAL_MS } from './gcp/operations.js';
import { DEFAULT_STATE_FILE } from './plan/state.js';
import type { Plan } from './plan/types.js';

export const DEFAULT_PLAN_FILE = 'provision.yaml';

/** Options shared by commands that touch the checkpoint */
export interface StateCliOptions {
  state?: string;
  scope?: string;
}

export interface RunCliOptions extends StateCliOptions {
  pollInterval?: string;
}

export interface RunConfig {
  planFile: string;
  stateFile: string;
  /** Undefined selects the flat checkpoint */
  scope: string | undefined;
  pollIntervalMs: number;
  eventsPath: string;
}

/** Plan path: argument → PROVISION_PLAN → provision.yaml */
export function resolvePlanFile(
  arg: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  return resolve(cwd, arg ?? (env.PROVISION_PLAN || DEFAULT_PLAN_FILE));
}

export function parsePollInterval(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_POLL_INTERVAL_MS;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ProvisionError(
      ErrorCode.INVALID_CONFIG,
      `poll interval must be a non-negative number of seconds, got "${raw}"`,
      'Example: --poll-interval 5',
    );
  }
  return Math.round(seconds * 1000);
}

/**
 * Merge CLI options, environment and plan settings.
 * Precedence: CLI → environment → plan → built-in default.
 */
export function resolveRunConfig(
  plan: Pick<Plan, 'scope' | 'state_file'> | null,
  planFile: string,
  options: RunCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const stateFile = resolve(
    cwd,
    options.state ?? (env.PROVISION_STATE_FILE || plan?.state_file || DEFAULT_STATE_FILE),
  );
  const scope = options.scope ?? (env.PROVISION_SCOPE || plan?.scope || undefined);
  const pollIntervalMs = parsePollInterval(options.pollInterval ?? env.PROVISION_POLL_INTERVAL);

  return {
    planFile,
    stateFile,
    scope,
    pollIntervalMs,
    eventsPath: join(dirname(stateFile), '.provision', 'events.jsonl'),
  };
}
