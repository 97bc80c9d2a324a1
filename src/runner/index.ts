export { runSteps, type RunStepsOptions } from './runner.js';
export { pendingSteps, nextPendingStep, isRunComplete } from './find-next.js';
export {
  isShuttingDown,
  setStepInFlight,
  installShutdownHandlers,
  handleInterrupt,
  resetShutdownState,
} from './shutdown.js';
export type { StepContext, ResolvedStep, RunStatus, RunOutcome } from './types.js';
