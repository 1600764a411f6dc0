/**
 * Policy validation module.
 *
 * @module
 */

// Types
export type { PolicyValidationIssue, PolicyValidationResult } from './types.js';

// Constants
export {
  ISSUE_CODES,
  PATCH_OPERATIONS,
  SELECTOR_OPERATORS,
  PATTERN_ROOT,
} from './constants.js';
export type { IssueCode, PatchOperation } from './constants.js';

// Validators
export { PolicyValidator } from './policy-validator.js';
export type { ValidatorOptions } from './policy-validator.js';
export { validateRuleType } from './validators/rule-type.js';
export { validateResourceDescription } from './validators/resource-description.js';
export { validateOverlayPattern } from './validators/overlay-pattern.js';
export { validateGeneration } from './validators/generation.js';
export { validatePatch } from './validators/patch.js';
export {
  validateExistingAnchorOnPattern,
  validateExistingAnchors,
} from './validators/existing-anchor.js';
export type { AnchorWalkOptions } from './validators/existing-anchor.js';

// Selector
export { compileSelector, checkLabelKey, checkLabelValue, SelectorError } from './selector.js';
export type { LabelRequirement } from './selector.js';

// Error
export { PolicyValidationError } from './policy-validation-error.js';
