/**
 * Shared CLI option helpers.
 *
 * Path resolution, option parsing and colored console output used by the
 * commands.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import chalk from 'chalk';

import type { LogLevel } from '../types/config.js';
import { isLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input file exists.
 * Prints a chalk-colored error and exits if not found or a directory.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);

  if (!existsSync(resolved)) {
    console.error(
      chalk.red(`Error: Input file does not exist: ${resolved}`),
    );
    process.exit(1);
  }

  if (statSync(resolved).isDirectory()) {
    console.error(
      chalk.red(`Error: Input path is a directory, expected a JSON file: ${resolved}`),
    );
    process.exit(1);
  }

  return resolved;
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

/**
 * Parse a --log-level value. Exits on an unknown level.
 *
 * @example parseLogLevel('WARN') => 'warn'
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    console.error(
      chalk.red(`Error: Unknown log level "${value}". Use: debug, info, warn, error, silent`),
    );
    process.exit(1);
  }
  return normalized;
}

/** Parse a --indent value. Exits unless it is an integer from 0 to 10. */
export function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
    console.error(chalk.red(`Error: --indent must be an integer from 0 to 10, got "${value}"`));
    process.exit(1);
  }
  return indent;
}

// ---------------------------------------------------------------------------
// Console output
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
