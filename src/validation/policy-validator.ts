/**
 * Policy validator.
 *
 * Validates every rule of a policy and returns all issues rather than
 * throwing on the first problem. Rule-name uniqueness is the one check that
 * stops at its first finding.
 *
 * @module
 */

import type { Policy, Rule } from '../types/policy.js';
import { isGenerationSet } from '../types/policy.js';
import { DEFAULT_MAX_DEPTH } from './constants.js';
import { IssueCollector, issue } from './types.js';
import type { PolicyValidationIssue, PolicyValidationResult } from './types.js';
import { PolicyValidationError } from './policy-validation-error.js';
import { validateRuleType } from './validators/rule-type.js';
import { validateResourceDescription } from './validators/resource-description.js';
import { validateOverlayPattern } from './validators/overlay-pattern.js';
import { validateExistingAnchors } from './validators/existing-anchor.js';
import { validatePatch } from './validators/patch.js';
import { validateGeneration } from './validators/generation.js';

/** Options for {@link PolicyValidator}. */
export interface ValidatorOptions {
  /** Maximum pattern nesting depth (default 100). */
  maxDepth?: number;
  /**
   * When true, also checks `mutate.patches` and the `generate` source of
   * every rule.
   */
  validateActions?: boolean;
}

/**
 * Validates decoded policies.
 *
 * ```ts
 * const v = new PolicyValidator();
 * const result = v.validate(policy);
 * if (!result.valid) { … }
 * ```
 *
 * Instances hold no mutable state and can be shared.
 */
export class PolicyValidator {
  private readonly maxDepth: number;
  private readonly validateActions: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.validateActions = options.validateActions ?? false;
  }

  /** Validates a whole policy: every rule, then name uniqueness. */
  validate(policy: Policy): PolicyValidationResult {
    const collector = new IssueCollector();

    for (const rule of policy.rules) {
      collector.addAll(this.validateRule(rule));
    }

    collector.add(this.validateUniqueRuleNames(policy));

    return collector.toResult();
  }

  /**
   * Validates one rule. Every check runs; issues come back in the order
   * rule type, match, exclude, pattern presence, anchors, actions.
   */
  validateRule(rule: Rule): PolicyValidationIssue[] {
    const collector = new IssueCollector();

    collector.add(validateRuleType(rule));
    collector.add(
      validateResourceDescription(rule.matchResources, { rule: rule.name, field: 'match.resources' }),
    );
    collector.add(
      validateResourceDescription(rule.excludeResources, {
        rule: rule.name,
        field: 'exclude.resources',
      }),
    );
    collector.add(validateOverlayPattern(rule));
    collector.addAll(validateExistingAnchors(rule, { maxDepth: this.maxDepth }));

    if (this.validateActions) {
      rule.mutation.patches.forEach((patch, i) => {
        collector.add(validatePatch(patch, { rule: rule.name, field: `mutate.patches[${i}]` }));
      });

      if (isGenerationSet(rule.generation)) {
        collector.add(validateGeneration(rule.generation, rule.name));
      }
    }

    return collector.toResult().errors;
  }

  /** Returns an issue for the first repeated rule name. */
  validateUniqueRuleNames(policy: Policy): PolicyValidationIssue | undefined {
    const seen = new Set<string>();

    for (const rule of policy.rules) {
      if (seen.has(rule.name)) {
        return issue('DuplicateRuleName', `duplicate rule name: '${rule.name}'`, {
          rule: rule.name,
        });
      }
      seen.add(rule.name);
    }

    return undefined;
  }

  /**
   * Validates and throws the composite error when anything is wrong.
   *
   * @throws {PolicyValidationError}
   */
  assertValid(policy: Policy): void {
    const result = this.validate(policy);
    if (!result.valid) {
      const subject = policy.name !== undefined ? `policy '${policy.name}'` : 'policy';
      throw new PolicyValidationError(
        `Validation of ${subject} failed with ${result.errors.length} error(s)`,
        result.errors,
      );
    }
  }
}
