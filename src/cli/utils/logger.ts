/**
 * CLI logging utilities
 */

import chalk from 'chalk';

/**
 * Log info message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Log success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Log warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Log error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Whether debug output is enabled (ARCHIVE_LEDGER_DEBUG)
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.ARCHIVE_LEDGER_DEBUG;
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

/**
 * Log debug message (only when ARCHIVE_LEDGER_DEBUG is set)
 */
export function debug(message: string): void {
  if (isDebugEnabled()) {
    console.log(chalk.gray('[debug]'), message);
  }
}

/**
 * Log section header
 */
export function section(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`━━━ ${title} ━━━`));
  console.log();
}

/**
 * Log key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.log(chalk.gray(`${key}:`), chalk.white(value));
}

/**
 * Log indented command suggestions
 */
export function hints(lines: string[]): void {
  for (const line of lines) {
    console.log(chalk.dim(`  ${chalk.cyan(line)}`));
  }
}

/**
 * Log empty line
 */
export function newline(): void {
  console.log();
}
