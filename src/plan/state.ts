import { writeFileSync, readFileSync, renameSync, mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ProvisionError, ErrorCode, errorMessage } from '../lib/errors.js';

// ── Types ──

/** Step names whose invocation returned without error, in completion order */
export interface CompletedSet {
  completed: string[];
}

/** Multi-scope file: one completed-set per scope key */
export type ScopedState = Record<string, CompletedSet>;

export type StateShape = 'absent' | 'flat' | 'scoped';

export const DEFAULT_STATE_FILE = 'orchestration_state.json';

/** Scope reported for the flat (single completed-set) variant */
export const GLOBAL_SCOPE = 'global';

const completedSetSchema = z.object({ completed: z.array(z.string()) });
const flatStateSchema = completedSetSchema.strict();
const scopedStateSchema = z.record(completedSetSchema);

/** Durable record of completed steps for one scope */
export interface CheckpointStore {
  readonly path: string;
  readonly scope: string;
  load(): CompletedSet;
  save(state: CompletedSet): void;
}

export function emptyState(): CompletedSet {
  return { completed: [] };
}

// ── Persistence (atomic write) ──

export function writeJsonAtomic(target: string, value: unknown): void {
  try {
    mkdirSync(dirname(target), { recursive: true });
    const json = JSON.stringify(value, null, 2) + '\n';
    const tmp = `${target}.tmp`;
    writeFileSync(tmp, json);
    renameSync(tmp, target);
  } catch (err) {
    throw new ProvisionError(
      ErrorCode.STATE_WRITE_FAILED,
      `Could not write checkpoint ${target}: ${errorMessage(err)}`,
    );
  }
}

/** Parsed file contents, or undefined when the file is absent or empty */
function readJson(path: string): unknown {
  if (!existsSync(path)) return undefined;

  const raw = readFileSync(path, 'utf-8');
  if (raw.trim() === '') return undefined;

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw corrupt(path, `not valid JSON (${errorMessage(err)})`);
  }
}

function corrupt(path: string, detail: string, hint?: string): ProvisionError {
  return new ProvisionError(
    ErrorCode.STATE_CORRUPT,
    `Checkpoint file ${path} is ${detail}`,
    hint ?? `Fix or delete ${path}; deleting it re-runs every step`,
  );
}

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

/** Which variant a state file holds */
export function detectStateShape(path: string): StateShape {
  const raw = readJson(path);
  if (raw === undefined || isEmptyObject(raw)) return 'absent';
  if (flatStateSchema.safeParse(raw).success) return 'flat';
  if (scopedStateSchema.safeParse(raw).success) return 'scoped';
  throw corrupt(path, 'not a checkpoint record');
}

// ── Flat store ──

/** Single completed-set: `{ "completed": [...] }` */
export class FileCheckpointStore implements CheckpointStore {
  readonly scope = GLOBAL_SCOPE;

  constructor(readonly path: string) {}

  load(): CompletedSet {
    const raw = readJson(this.path);
    if (raw === undefined || isEmptyObject(raw)) return emptyState();

    const flat = flatStateSchema.safeParse(raw);
    if (flat.success) return { completed: [...flat.data.completed] };

    if (scopedStateSchema.safeParse(raw).success) {
      throw corrupt(
        this.path,
        'keyed by scope',
        'Pass --scope <key> to use it, or --state <file> for a separate flat checkpoint',
      );
    }
    throw corrupt(this.path, 'not a checkpoint record');
  }

  save(state: CompletedSet): void {
    writeJsonAtomic(this.path, { completed: [...state.completed] });
  }
}

// ── Scoped store ──

/** Scope keys that cannot be stored as an own property of a plain object */
const RESERVED_SCOPES = ['__proto__'];

export function isValidScope(scope: string): boolean {
  return scope.length > 0 && !RESERVED_SCOPES.includes(scope);
}

/** One completed-set per scope: `{ "<scope>": { "completed": [...] } }` */
export class ScopedCheckpointStore implements CheckpointStore {
  constructor(
    readonly path: string,
    readonly scope: string,
  ) {
    if (!isValidScope(scope)) {
      throw new ProvisionError(
        ErrorCode.INVALID_CONFIG,
        `"${scope}" cannot be used as a checkpoint scope`,
        'Pick another --scope key',
      );
    }
  }

  /** Every scope recorded in the file */
  readAll(): ScopedState {
    const raw = readJson(this.path);
    if (raw === undefined) return {};

    if (flatStateSchema.safeParse(raw).success) {
      throw corrupt(
        this.path,
        'a flat checkpoint',
        'Run without --scope to use it, or --state <file> for a separate scoped checkpoint',
      );
    }

    const scoped = scopedStateSchema.safeParse(raw);
    if (!scoped.success) throw corrupt(this.path, 'not a checkpoint record');
    return scoped.data;
  }

  load(): CompletedSet {
    const all = this.readAll();
    // Own keys only: a scope named after an Object.prototype member is a plain key
    const entry = Object.hasOwn(all, this.scope) ? all[this.scope] : undefined;
    return entry ? { completed: [...entry.completed] } : emptyState();
  }

  /** Rewrites the whole file, replacing only this scope's entry */
  save(state: CompletedSet): void {
    const all = this.readAll();
    all[this.scope] = { completed: [...state.completed] };
    writeJsonAtomic(this.path, all);
  }
}

// ── Factory ──

/** Flat store without a scope, scoped store with one */
export function openCheckpointStore(path: string, scope?: string): CheckpointStore {
  const absolute = resolve(path);
  return scope ? new ScopedCheckpointStore(absolute, scope) : new FileCheckpointStore(absolute);
}

/** Scopes and their progress in a scoped file (empty for other shapes) */
export function listScopes(path: string): Array<{ scope: string; completed: string[] }> {
  if (detectStateShape(path) !== 'scoped') return [];
  const all = new ScopedCheckpointStore(path, GLOBAL_SCOPE).readAll();
  return Object.entries(all).map(([scope, entry]) => ({ scope, completed: entry.completed }));
}

/**
 * Remove step names from the completed set so the next run executes them again.
 * Returns the names that were actually removed.
 */
export function removeCompleted(store: CheckpointStore, names: string[] | 'all'): string[] {
  const state = store.load();
  const removed = names === 'all'
    ? [...state.completed]
    : state.completed.filter((n) => names.includes(n));

  if (removed.length === 0) return [];

  store.save({ completed: state.completed.filter((n) => !removed.includes(n)) });
  return removed;
}
