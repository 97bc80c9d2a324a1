import chalk from 'chalk';
import { debug } from './debug.js';

/** Logger handed to step implementations */
export interface StepLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string, ...data: unknown[]): void;
}

/** Console logger prefixed with the step name */
export function createStepLogger(stepName: string): StepLogger {
  return {
    info: (message) => console.log(`  ${chalk.dim(`[${stepName}]`)} ${message}`),
    warn: (message) => console.warn(`  ${chalk.dim(`[${stepName}]`)} ${chalk.yellow(message)}`),
    error: (message) => console.error(`  ${chalk.dim(`[${stepName}]`)} ${chalk.red(message)}`),
    debug: (message, ...data) => debug(`step:${stepName}`, message, ...data),
  };
}
