import { z } from 'zod';
import { isValidScope } from './state.js';

// ── Reusable primitives ──

const kebabCase = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be kebab-case');

const stepName = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'must use lowercase letters, digits, "_" or "-"');

// ── Step schema ──

export const stepSchema = z
  .object({
    name: stepName,
    /** Registered step kind; defaults to the step name */
    target: z.string().min(1).optional(),
    description: z.string().optional(),
    args: z.record(z.unknown()).default({}),
  })
  .strict();

// ── Plan schema ──

export const planSchema = z
  .object({
    name: kebabCase,
    description: z.string().optional(),
    /** Checkpoint scope; absent means one flat completed-set */
    scope: z.string().min(1).refine(isValidScope, 'is reserved and cannot name a scope').optional(),
    state_file: z.string().min(1).optional(),
    steps: z.array(stepSchema).min(1),
  })
  .strict();

// ── Derived TypeScript types ──

export type StepSpec = z.infer<typeof stepSchema>;
export type Plan = z.infer<typeof planSchema>;

/** Registered target a step spec points at */
export function stepTarget(step: StepSpec): string {
  return step.target ?? step.name;
}
