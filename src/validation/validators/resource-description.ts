/**
 * Resource description (match / exclude) validation.
 *
 * @module
 */

import type { ResourceDescription } from '../../types/policy.js';
import { isResourceDescriptionSet } from '../../types/policy.js';
import type { PolicyValidationIssue } from '../types.js';
import { issue } from '../types.js';
import { compileSelector, SelectorError } from '../selector.js';

export interface DescriptionContext {
  rule?: string;
  field?: string;
}

/**
 * Checks a match or exclude block.
 *
 * An empty description is valid. Otherwise `kinds` must be non-empty and a
 * present selector must compile to at least one requirement.
 */
export function validateResourceDescription(
  rd: ResourceDescription,
  context: DescriptionContext = {},
): PolicyValidationIssue | undefined {
  if (!isResourceDescriptionSet(rd)) {
    return undefined;
  }

  if (rd.kinds.length === 0) {
    return issue('MissingResourceKind', 'field Kind is not specified', context);
  }

  if (rd.selector !== undefined) {
    const selectorContext = {
      ...context,
      field: context.field !== undefined ? `${context.field}.selector` : 'selector',
    };

    let requirementCount: number;
    try {
      requirementCount = compileSelector(rd.selector).length;
    } catch (err) {
      if (err instanceof SelectorError) {
        return issue('InvalidSelector', err.message, selectorContext);
      }
      throw err;
    }

    if (requirementCount === 0) {
      return issue(
        'EmptySelectorRequirements',
        'the requirements are not specified in selector',
        selectorContext,
      );
    }
  }

  return undefined;
}
