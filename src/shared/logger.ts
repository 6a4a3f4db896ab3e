/**
 * @file src/shared/logger.ts
 * @description Scoped console loggers. Library code takes a {@link Logger} through its options
 *              and stays quiet by default; commands hand in a scoped one.
 */

import chalk from 'chalk';

export type Logger = Pick<Console, 'debug' | 'log' | 'warn'>;

export interface LoggerOptions {
  verbose?: boolean;
}

export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => ({
  debug: (...args) => {
    if (options.verbose) console.debug(chalk.gray(`[${scope}]`), ...args);
  },
  log: (...args) => console.log(`[${scope}]`, ...args),
  warn: (...args) => console.warn(chalk.yellow(`[${scope}]`), ...args),
});

export const silentLogger: Logger = {
  debug: () => undefined,
  log: () => undefined,
  warn: () => undefined,
};
