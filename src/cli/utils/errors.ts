/**
 * CLI error classes.
 */

import { ExitCode } from '../types.js';
import type { PolicyValidationIssue } from '../../validation/types.js';

/** Base CLI error */
export class CliError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: Error | undefined;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: Error) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

/** Invalid command line arguments */
export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

/** File not found */
export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** Policy validation failed */
export class ValidationError extends CliError {
  public readonly errors: PolicyValidationIssue[];

  constructor(message: string, errors: PolicyValidationIssue[] = [], cause?: Error) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** Where in a policy an issue points: rule, wire field and pattern path */
export function formatIssueLocation(issue: PolicyValidationIssue): string {
  const parts: string[] = [];
  if (issue.rule !== undefined) parts.push(`rule '${issue.rule}'`);
  if (issue.field !== undefined) parts.push(issue.field);
  if (issue.path !== undefined) parts.push(issue.path);
  return parts.length > 0 ? parts.join(' ') : '(policy)';
}

/** Exit code for an error */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  return ExitCode.GeneralError;
}

/** Formats an error for output */
export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    let message = error.message;
    if (error instanceof ValidationError && error.errors.length > 0) {
      message +=
        '\n' + error.errors.map((e) => `  ✗ ${formatIssueLocation(e)}: ${e.message}`).join('\n');
    }
    return message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
