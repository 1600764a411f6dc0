/**
 * Output utilities for the CLI.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';

interface OutputOptions {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

/** Global output settings */
let outputOptions: OutputOptions = {
  quiet: false,
  noColor: false,
  format: 'pretty'
};

export function setOutputOptions(options: Partial<OutputOptions>): void {
  outputOptions = { ...outputOptions, ...options };
}

/** Color support detection */
export function supportsColor(): boolean {
  if (outputOptions.noColor) {
    return false;
  }

  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }

  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }

  return process.stdout.isTTY === true;
}

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m'
} as const;

export type ColorName = keyof typeof colors;

export function colorize(text: string, color: ColorName): string {
  if (!supportsColor()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function success(message: string): string {
  return colorize('✓', 'green') + ' ' + message;
}

export function info(message: string): string {
  return colorize('ℹ', 'blue') + ' ' + message;
}

/** Writes to stdout unless quiet */
export function print(message: string): void {
  if (!outputOptions.quiet) {
    console.log(message);
  }
}

/** Writes to stderr */
export function printError(message: string): void {
  console.error(message);
}

/** Writes formatted data */
export function printData(data: FormattableData): void {
  if (outputOptions.quiet && data.type !== 'error') {
    return;
  }

  const formatter = createFormatter(outputOptions.format, supportsColor());
  const output = formatter.format(data);

  if (data.type === 'error') {
    printError(output);
  } else {
    print(output);
  }
}
