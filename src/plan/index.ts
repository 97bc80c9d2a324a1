export { parsePlanYaml, loadPlanFile, resolvePlan, expandVariables, formatPlanError } from './parser.js';
export {
  FileCheckpointStore,
  ScopedCheckpointStore,
  openCheckpointStore,
  detectStateShape,
  listScopes,
  removeCompleted,
  emptyState,
  DEFAULT_STATE_FILE,
  GLOBAL_SCOPE,
} from './state.js';
export type { CheckpointStore, CompletedSet, ScopedState, StateShape } from './state.js';
export type { Plan, StepSpec } from './types.js';
export { planSchema, stepSchema, stepTarget } from './types.js';
export { buildDefaultPlan, type DefaultPlanParams } from './default-plan.js';
