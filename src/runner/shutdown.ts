/**
 * Graceful shutdown handler.
 *
 * - First Ctrl+C: set shuttingDown flag, finish the current step
 * - Second Ctrl+C: exit immediately; the current step stays unmarked
 */
import { EXIT } from '../lib/exit-codes.js';

let _isShuttingDown = false;
let _stepInFlight = false;
let _sigintCount = 0;
let _installed = false;

/** Whether shutdown has been requested */
export function isShuttingDown(): boolean {
  return _isShuttingDown;
}

/** Mark whether a step invocation is currently running */
export function setStepInFlight(inFlight: boolean): void {
  _stepInFlight = inFlight;
}

/** React to one Ctrl+C */
export function handleInterrupt(): void {
  _sigintCount++;

  if (_sigintCount === 1) {
    if (!_stepInFlight) {
      process.exit(EXIT.INTERRUPTED);
    }
    console.log('\n⏸ Stopping after the current step completes...');
    console.log('  Press Ctrl+C again to force quit.\n');
    _isShuttingDown = true;
  } else {
    console.log('\n⚡ Force quit. The current step was not recorded and will run again.');
    process.exit(EXIT.FORCE_QUIT);
  }
}

/** Install signal handlers. Safe to call multiple times (idempotent). */
export function installShutdownHandlers(): void {
  if (_installed) return;
  _installed = true;
  process.on('SIGINT', handleInterrupt);
}

/** Reset shutdown state (for testing) */
export function resetShutdownState(): void {
  _isShuttingDown = false;
  _stepInFlight = false;
  _sigintCount = 0;
}
