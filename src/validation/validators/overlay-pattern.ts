/**
 * Validation pattern presence.
 *
 * @module
 */

import type { Rule } from '../../types/policy.js';
import { isValidationSet } from '../../types/policy.js';
import type { PolicyValidationIssue } from '../types.js';
import { issue } from '../types.js';

/** A set `validate` block needs exactly one of `pattern` and `anyPattern`. */
export function validateOverlayPattern(rule: Rule): PolicyValidationIssue | undefined {
  const { validation } = rule;
  if (!isValidationSet(validation)) {
    return undefined;
  }

  const hasPattern = validation.pattern !== undefined;
  const hasAnyPattern = validation.anyPattern.length > 0;

  if (!hasPattern && !hasAnyPattern) {
    return issue(
      'MissingPattern',
      `neither pattern nor anyPattern found in rule '${rule.name}'`,
      { rule: rule.name, field: 'validate' },
    );
  }

  if (hasPattern && hasAnyPattern) {
    return issue(
      'ConflictingPatternFields',
      `either pattern or anyPattern is allowed in rule '${rule.name}'`,
      { rule: rule.name, field: 'validate' },
    );
  }

  return undefined;
}
