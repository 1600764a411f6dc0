/**
 * Generate rule validation.
 *
 * @module
 */

import type { Generation } from '../../types/policy.js';
import { isCloneSet } from '../../types/policy.js';
import type { PolicyValidationIssue } from '../types.js';
import { issue } from '../types.js';

export function validateGeneration(
  generation: Generation,
  rule?: string,
): PolicyValidationIssue | undefined {
  const hasData = generation.data !== undefined;
  const hasClone = isCloneSet(generation.clone);
  const context = { rule, field: 'generate' };

  if (!hasData && !hasClone) {
    return issue(
      'MissingGenerationSource',
      `neither data nor clone (source) of ${generation.kind} is specified`,
      context,
    );
  }

  if (hasData && hasClone) {
    return issue(
      'ConflictingGenerationSource',
      `both data and clone (source) of ${generation.kind} are specified`,
      context,
    );
  }

  return undefined;
}
