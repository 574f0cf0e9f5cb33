import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Colored console output for interactive runs
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly verbose: boolean = false) {}

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(message));
    }
  }

  info(message: string): void {
    console.log(chalk.blue(message));
  }

  success(message: string): void {
    console.log(chalk.green(message));
  }

  warn(message: string): void {
    console.log(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }
}

/**
 * Fans every line out to several loggers (console + task log file)
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: readonly Logger[]) {}

  debug(message: string): void {
    this.loggers.forEach((l) => l.debug(message));
  }

  info(message: string): void {
    this.loggers.forEach((l) => l.info(message));
  }

  success(message: string): void {
    this.loggers.forEach((l) => l.success(message));
  }

  warn(message: string): void {
    this.loggers.forEach((l) => l.warn(message));
  }

  error(message: string): void {
    this.loggers.forEach((l) => l.error(message));
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
