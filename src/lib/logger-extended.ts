/**
 * Extended logging utilities for structured CLI output
 */

import chalk from 'chalk';

/**
 * Log a section header with optional emoji
 */
export function logSection(title: string, emoji?: string): void {
  const header = emoji ? `${emoji} ${title}` : title;
  console.log(`\n${chalk.bold(header)}`);
}

/**
 * Log a key-value pair
 */
export function logKeyValue(key: string, value: string | number, indent: number = 1): void {
  const spacing = '  '.repeat(indent);
  console.log(`${spacing}${chalk.gray(key + ':')} ${value}`);
}

/**
 * Log a success message with checkmark
 */
export function logSuccess(message: string, details?: string): void {
  const successMark = chalk.green('✓');
  if (details) {
    console.log(`${successMark} ${message} - ${chalk.gray(details)}`);
  } else {
    console.log(`${successMark} ${message}`);
  }
}

/**
 * Log a warning message with warning sign
 */
export function logWarningMessage(message: string, details?: string): void {
  const warningMark = chalk.yellow('⚠');
  if (details) {
    console.log(`${warningMark} ${message} - ${chalk.gray(details)}`);
  } else {
    console.log(`${warningMark} ${message}`);
  }
}

/**
 * Log an error message with X mark
 */
export function logError(message: string, error?: unknown): void {
  const errorMark = chalk.red('✗');
  console.log(`${errorMark} ${message}`);
  if (error) {
    const errorMessage = error instanceof Error
      ? error.message
      : typeof error === 'object' && error !== null
        ? JSON.stringify(error)
        : String(error);
    console.log(`   ${chalk.red(errorMessage)}`);
  }
}

/**
 * Log a separator line
 */
export function logSeparator(char: string = '-', length: number = 40): void {
  console.log(char.repeat(length));
}
