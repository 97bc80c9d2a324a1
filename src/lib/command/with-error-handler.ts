import chalk from 'chalk';
import { ProvisionError, VALIDATION_CODES } from '../errors.js';
import { EXIT } from '../exit-codes.js';

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors and prints user-friendly output.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof ProvisionError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        process.exit(VALIDATION_CODES.includes(err.code) ? EXIT.INVALID : EXIT.STOPPED);
      }

      console.error(chalk.red(err instanceof Error ? `✗ ${err.message}` : '✗ An unexpected error occurred'));
      process.exit(EXIT.STOPPED);
    }
  };
}
