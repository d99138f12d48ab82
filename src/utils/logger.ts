/**
 * Console logger used by the CLI and as the validator's default.
 */

import chalk from 'chalk';
import { Logger } from '../core/types';

export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(chalk.yellow(`⚠️  ${message}`)),
    error: (message) => console.error(chalk.red(`❌ ${message}`)),
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
