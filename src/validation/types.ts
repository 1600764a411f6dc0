/**
 * Validation types and internal utilities.
 *
 * @module
 */

import type { IssueCode } from './constants.js';

/** Single validation problem found in a policy. */
export interface PolicyValidationIssue {
  code: IssueCode;
  message: string;
  /** Name of the rule the issue belongs to. */
  rule?: string;
  /** Dotted wire field, e.g. `match.resources` or `validate.anyPattern[1]`. */
  field?: string;
  /** Slash path inside a pattern tree, e.g. `/spec/containers/`. */
  path?: string;
}

/** Result of a validation run. */
export interface PolicyValidationResult {
  valid: boolean;
  errors: PolicyValidationIssue[];
}

/**
 * Internal helper for accumulating issues.
 *
 * Field validators return at most one issue; the aggregator feeds them in
 * here in a fixed order so reports are reproducible.
 */
export class IssueCollector {
  private readonly _errors: PolicyValidationIssue[] = [];

  add(issue: PolicyValidationIssue | undefined): void {
    if (issue !== undefined) {
      this._errors.push(issue);
    }
  }

  addAll(issues: readonly PolicyValidationIssue[]): void {
    for (const issue of issues) {
      this._errors.push(issue);
    }
  }

  get size(): number {
    return this._errors.length;
  }

  toResult(): PolicyValidationResult {
    return {
      valid: this._errors.length === 0,
      errors: [...this._errors],
    };
  }
}

/** Builds an issue, leaving out context fields that are not known. */
export function issue(
  code: IssueCode,
  message: string,
  context: { rule?: string | undefined; field?: string | undefined; path?: string | undefined } = {},
): PolicyValidationIssue {
  return {
    code,
    message,
    ...(context.rule !== undefined && { rule: context.rule }),
    ...(context.field !== undefined && { field: context.field }),
    ...(context.path !== undefined && { path: context.path }),
  };
}
