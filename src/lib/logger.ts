import chalk from "chalk";

export interface Logger {
  debug(log: string, ...args: unknown[]): void;
  info(log: string, ...args: unknown[]): void;
  warn(log: string, ...args: unknown[]): void;
  error(log: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements Logger {
  debug(log: string, ...args: unknown[]) {
    console.log(chalk.gray(log), ...args);
  }
  info(log: string, ...args: unknown[]) {
    console.log(log, ...args);
  }
  warn(log: string, ...args: unknown[]) {
    console.error(chalk.yellow(log), ...args);
  }
  error(log: string, ...args: unknown[]) {
    console.error(chalk.red(log), ...args);
  }
}

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

let active: Logger = new NullLogger();

/**
 * Diagnostics logger. Silent until `enableDebugLogging(true)`, which the CLI
 * calls when `DEBUG=true`.
 */
export const logger: Logger = {
  debug: (log, ...args) => active.debug(log, ...args),
  info: (log, ...args) => active.info(log, ...args),
  warn: (log, ...args) => active.warn(log, ...args),
  error: (log, ...args) => active.error(log, ...args),
};

export function enableDebugLogging(enabled: boolean): void {
  active = enabled ? new ConsoleLogger() : new NullLogger();
}
