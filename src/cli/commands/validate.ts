/**
 * The `validate` command: validates policy documents from files.
 */

import type { GlobalOptions } from '../types.js';
import { createValidator } from '../services/validator.js';
import { InvalidArgumentsError, ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';

export interface ValidateOptions extends GlobalOptions {
  maxDepth: number;
  validateActions: boolean;
}

/**
 * Action of the validate command.
 *
 * Prints a report for every file, then fails with a {@link ValidationError}
 * when any policy document has issues.
 */
export async function validateCommand(files: readonly string[], options: ValidateOptions): Promise<void> {
  if (files.length === 0) {
    throw new InvalidArgumentsError('At least one policy file is required');
  }

  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
    throw new InvalidArgumentsError(`Invalid --max-depth: ${options.maxDepth}`);
  }

  const validator = createValidator({
    maxDepth: options.maxDepth,
    validateActions: options.validateActions
  });

  const summary = await validator.validateFiles(files);

  printData({ type: 'validation', data: summary });

  if (!summary.valid) {
    throw new ValidationError(
      `Validation failed with ${summary.errorCount} error(s)`,
      summary.files.flatMap((f) => f.policies.flatMap((p) => p.errors))
    );
  }
}
