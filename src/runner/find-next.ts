import type { CompletedSet } from '../plan/state.js';

/** Steps not yet completed, in definition order */
export function pendingSteps(steps: ReadonlyArray<{ name: string }>, state: CompletedSet): string[] {
  return steps.filter((s) => !state.completed.includes(s.name)).map((s) => s.name);
}

/** First step a resumed run would execute, or null when nothing is left */
export function nextPendingStep(steps: ReadonlyArray<{ name: string }>, state: CompletedSet): string | null {
  return pendingSteps(steps, state)[0] ?? null;
}

/** Check if every step has completed */
export function isRunComplete(steps: ReadonlyArray<{ name: string }>, state: CompletedSet): boolean {
  return pendingSteps(steps, state).length === 0;
}
