// shared/logger.ts
import chalk from 'chalk';

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
}

function stamp(scope: string): string {
  const now = new Date();
  const time = now.toISOString().split('T')[1].replace('Z', '');
  return `[leyning:${scope} | ${time}]`;
}

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const verbose = opts.verbose ?? false;
  return {
    verbose,
    info(message, ...args) {
      console.log(`${chalk.blue(stamp(scope))} ${message}`, ...args);
    },
    debug(message, ...args) {
      if (!verbose) return;
      console.log(`${chalk.gray(stamp(scope))} ${message}`, ...args);
    },
    warn(message, ...args) {
      console.warn(`${chalk.yellow(stamp(scope))} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${chalk.red(stamp(scope))} ${message}`, ...args);
    },
  };
}

/** Logger that drops everything; used where a caller passes none. */
export const silentLogger: Logger = {
  verbose: false,
  info() {},
  debug() {},
  warn() {},
  error() {},
};
