import chalk from 'chalk';
import type { Ora } from 'ora';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info: message => console.log(message),
    success: message => console.log(chalk.green(`✅ ${message}`)),
    warn: message => console.warn(chalk.yellow(`⚠️  ${message}`)),
    error: message => console.error(chalk.red(`❌ ${message}`)),
    debug: message => {
      if (options.verbose) {
        console.log(chalk.gray(message));
      }
    }
  };
}

/**
 * Logger that writes through a running spinner so lines and spinner frames
 * do not interleave. The spinner keeps running after each persisted line.
 */
export function createSpinnerLogger(spinner: Ora, options: ConsoleLoggerOptions = {}): Logger {
  return {
    info: message => {
      spinner.text = message;
    },
    success: message => {
      spinner.succeed(message).start();
    },
    warn: message => {
      spinner.warn(message).start();
    },
    error: message => {
      spinner.fail(message).start();
    },
    debug: message => {
      if (options.verbose) {
        spinner.stopAndPersist({ symbol: chalk.gray('·'), text: chalk.gray(message) }).start();
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};

/**
 * Shortened form of an identifier for log output, e.g. `AKIA…MPLE`.
 * Values of eight characters or fewer are fully masked.
 */
export function maskIdentifier(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, 4)}…${value.slice(-4)}`;
}
