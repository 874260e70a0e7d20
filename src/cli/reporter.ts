import chalk from "chalk";

/**
 * User-facing output. Progress goes to stdout, warnings and errors to stderr.
 */
export interface Reporter {
  heading(message: string): void;
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleReporter(): Reporter {
  return {
    heading: (message) => console.log(chalk.bold(message)),
    step: (message) => console.log(`${chalk.cyan("→")} ${message}`),
    info: (message) => console.log(message),
    success: (message) => console.log(`${chalk.green("✅")} ${message}`),
    warn: (message) => console.error(chalk.yellow(`⚠️  ${message}`)),
    error: (message) => console.error(chalk.red(`❌ ${message}`)),
  };
}
