import { existsSync } from 'node:fs';
import { loadPlanFile, resolvePlan } from '../plan/parser.js';
import { openCheckpointStore, type CheckpointStore } from '../plan/state.js';
import type { Plan } from '../plan/types.js';
import type { ResolvedStep } from '../runner/types.js';
import { createStepRegistry } from '../steps/index.js';
import { resolvePlanFile, resolveRunConfig, type RunCliOptions, type RunConfig } from '../config.js';

export interface RunContext {
  plan: Plan;
  steps: ResolvedStep[];
  config: RunConfig;
  store: CheckpointStore;
}

/** Load the plan, resolve every step against the registry and open its checkpoint */
export function loadRunContext(planArg: string | undefined, options: RunCliOptions): RunContext {
  const planFile = resolvePlanFile(planArg);
  const plan = loadPlanFile(planFile);
  const steps = resolvePlan(plan, createStepRegistry());
  const config = resolveRunConfig(plan, planFile, options);
  return { plan, steps, config, store: openCheckpointStore(config.stateFile, config.scope) };
}

/**
 * Plan for commands that can work from the checkpoint alone.
 * An explicit path must load; the default path is optional.
 */
export function loadOptionalPlan(planArg: string | undefined): { plan: Plan | null; planFile: string } {
  const planFile = resolvePlanFile(planArg);
  if (!planArg && !existsSync(planFile)) {
    return { plan: null, planFile };
  }
  return { plan: loadPlanFile(planFile), planFile };
}
