/**
 * Error thrown when policy validation fails.
 *
 * Compatible with the API error handler (`statusCode` + `code` pattern).
 *
 * @module
 */

import type { PolicyValidationIssue } from './types.js';

export class PolicyValidationError extends Error {
  readonly statusCode = 400;
  readonly code = 'POLICY_VALIDATION_ERROR';
  readonly issues: PolicyValidationIssue[];

  constructor(message: string, issues: PolicyValidationIssue[]) {
    super(message);
    this.name = 'PolicyValidationError';
    this.issues = issues;
  }

  /** Exposes issues as `details` for the API error handler. */
  get details(): PolicyValidationIssue[] {
    return this.issues;
  }
}
