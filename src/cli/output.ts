/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message. Spinners render on stderr.
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
    stream: process.stderr,
  }).start();
  return spinner;
}

/**
 * Update spinner message
 *
 * @param message - New message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner without status
 */
export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

/**
 * Print a success message
 */
export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

/**
 * Print an error message to stderr
 */
export function printError(message: string): void {
  console.error(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an info message
 */
export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Run a write without the spinner frame getting in the way
 */
export function withSpinnerPaused(write: () => void): void {
  if (!spinner) {
    write();
    return;
  }
  spinner.clear();
  write();
  spinner.render();
}
