/**
 * Rule action type validation.
 *
 * @module
 */

import type { Rule } from '../../types/policy.js';
import { isGenerationSet, isMutationSet, isValidationSet } from '../../types/policy.js';
import type { PolicyValidationIssue } from '../types.js';
import { issue } from '../types.js';

/** Exactly one of mutate, validate and generate must be set. */
export function validateRuleType(rule: Rule): PolicyValidationIssue | undefined {
  const defined = [
    isMutationSet(rule.mutation),
    isValidationSet(rule.validation),
    isGenerationSet(rule.generation),
  ].filter(Boolean).length;

  if (defined === 0) {
    return issue('NoRuleTypeDefined', `no rule defined in '${rule.name}'`, { rule: rule.name });
  }

  if (defined > 1) {
    return issue(
      'MultipleRuleTypesDefined',
      `multiple types of rule defined in rule '${rule.name}', only one type of rule is allowed per rule`,
      { rule: rule.name },
    );
  }

  return undefined;
}
