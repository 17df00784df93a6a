/**
 * Console logger used by the CLI commands
 */

import chalk from 'chalk';
import type { Logger } from '../types';
import * as colors from './colors';

export interface ConsoleLoggerOptions {
  quiet?: boolean;  // Drop info lines; warnings and errors still print
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info: (message) => {
      if (!options.quiet) console.log(message);
    },
    warn: (message) => console.warn(colors.status.warning('⚠ ') + chalk.yellow(message)),
    error: (message) => console.error(colors.status.error('✗ ' + message)),
  };
}
