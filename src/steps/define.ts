import { z } from 'zod';
import type { StepContext } from '../runner/types.js';

// ── Shared argument primitives ──

export const projectIdSchema = z
  .string()
  .regex(
    /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/,
    'must be 6-30 lowercase letters, digits or hyphens, starting with a letter',
  );

export const regionSchema = z.string().regex(/^[a-z]+-[a-z]+\d+$/, 'must be a region such as us-central1');

// ── Step kinds ──

export interface StepDefinition<T> {
  target: string;
  description: string;
  args: z.ZodType<T, z.ZodTypeDef, unknown>;
  run(args: T, ctx: StepContext): Promise<unknown>;
}

export type ResolveResult =
  | { ok: true; invoke: (ctx: StepContext) => Promise<unknown> }
  | { ok: false; issues: string[] };

/** A registered step kind with its argument types erased behind `resolve` */
export interface StepKind {
  target: string;
  description: string;
  resolve(rawArgs: unknown): ResolveResult;
}

export function defineStep<T>(def: StepDefinition<T>): StepKind {
  return {
    target: def.target,
    description: def.description,
    resolve(rawArgs) {
      const result = def.args.safeParse(rawArgs);
      if (!result.success) {
        return {
          ok: false,
          issues: result.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return path ? `args.${path}: ${issue.message}` : `args: ${issue.message}`;
          }),
        };
      }
      const args = result.data;
      return { ok: true, invoke: (ctx) => def.run(args, ctx) };
    },
  };
}

// ── Registry ──

/** Closed table of step kinds, keyed by target name */
export class StepRegistry {
  private readonly kinds = new Map<string, StepKind>();

  register(kind: StepKind): this {
    if (this.kinds.has(kind.target)) {
      throw new Error(`step target "${kind.target}" is already registered`);
    }
    this.kinds.set(kind.target, kind);
    return this;
  }

  get(target: string): StepKind | undefined {
    return this.kinds.get(target);
  }

  targets(): string[] {
    return [...this.kinds.keys()];
  }
}
