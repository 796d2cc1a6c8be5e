import chalk from 'chalk';

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export const consoleLogger: Logger = {
  info(msg) {
    console.log(chalk.blue(`[info] ${msg}`));
  },
  success(msg) {
    console.log(chalk.green(`[ok] ${msg}`));
  },
  warn(msg) {
    console.log(chalk.yellow(`[warn] ${msg}`));
  },
  error(msg) {
    console.error(chalk.red(`[error] ${msg}`));
  },
};

export const silentLogger: Logger = {
  info() {},
  success() {},
  warn() {},
  error() {},
};

export function banner(): void {
  console.log(chalk.bold.cyan('\n  retail-bench | multi-platform shopping scenario runner\n'));
}

export function separator(): void {
  console.log(chalk.dim('─'.repeat(60)));
}

/** `key=value` pairs for step-level log lines. */
export function fields(values: Record<string, string | number>): string {
  return Object.entries(values)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
}
