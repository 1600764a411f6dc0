/**
 * Policy file validation service for the CLI.
 *
 * Loads policy documents from files and runs the shared
 * {@link PolicyValidator} over each of them.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadPoliciesFromFile } from '../../document/loader.js';
import { PolicyDocumentError } from '../../document/errors.js';
import { PolicyValidator, type ValidatorOptions } from '../../validation/policy-validator.js';
import type { Policy } from '../../types/policy.js';
import type { FileReport, PolicyReport, ValidationSummary } from '../types.js';
import { FileNotFoundError, ValidationError } from '../utils/errors.js';

export class PolicyFileValidator {
  private readonly validator: PolicyValidator;
  private readonly maxDepth: number | undefined;

  constructor(options: ValidatorOptions = {}) {
    this.validator = new PolicyValidator(options);
    this.maxDepth = options.maxDepth;
  }

  /**
   * Validates every policy document in a file.
   *
   * @throws FileNotFoundError when the file does not exist
   * @throws ValidationError when the file cannot be parsed or decoded
   */
  async validateFile(filePath: string): Promise<FileReport> {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
      throw new FileNotFoundError(filePath);
    }

    let policies: Policy[];
    try {
      policies = await loadPoliciesFromFile(
        absolutePath,
        this.maxDepth !== undefined ? { maxDepth: this.maxDepth } : {}
      );
    } catch (err) {
      if (err instanceof PolicyDocumentError) {
        throw new ValidationError(`Invalid policy document: ${err.message}`, [], err);
      }
      throw err;
    }

    const reports: PolicyReport[] = policies.map((policy) => {
      const result = this.validator.validate(policy);
      return {
        name: policy.name ?? null,
        ruleCount: policy.rules.length,
        valid: result.valid,
        errors: result.errors
      };
    });

    return {
      file: absolutePath,
      valid: reports.every((r) => r.valid),
      policies: reports
    };
  }

  /**
   * Validates files in order. A file that fails to load is recorded with its
   * error and the run goes on with the next one.
   *
   * @throws FileNotFoundError when a file does not exist
   */
  async validateFiles(filePaths: readonly string[]): Promise<ValidationSummary> {
    const files: FileReport[] = [];
    for (const filePath of filePaths) {
      try {
        files.push(await this.validateFile(filePath));
      } catch (err) {
        if (!(err instanceof ValidationError)) {
          throw err;
        }
        files.push({ file: resolve(filePath), valid: false, policies: [], loadError: err.message });
      }
    }
    return summarize(files);
  }
}

export function summarize(files: FileReport[]): ValidationSummary {
  const policies = files.flatMap((f) => f.policies);
  return {
    valid: files.every((f) => f.valid),
    fileCount: files.length,
    policyCount: policies.length,
    errorCount:
      policies.reduce((count, p) => count + p.errors.length, 0) +
      files.filter((f) => f.loadError !== undefined).length,
    files
  };
}

export function createValidator(options: ValidatorOptions = {}): PolicyFileValidator {
  return new PolicyFileValidator(options);
}
