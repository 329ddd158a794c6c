import chalk from 'chalk';

/**
 * Diagnostics go to stderr so stdout stays clean for JSON/CSV output.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, quiet = false } = options;
  return {
    debug(message) {
      if (verbose && !quiet) console.error(chalk.dim(message));
    },
    info(message) {
      if (!quiet) console.error(message);
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
