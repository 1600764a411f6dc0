/**
 * Shared validation constants.
 *
 * Single source of truth for issue codes, patch operations and selector
 * operators. Used by the validators, the document decoder and the CLI.
 *
 * @module
 */

export const ISSUE_CODES = [
  'DuplicateRuleName',
  'NoRuleTypeDefined',
  'MultipleRuleTypesDefined',
  'MissingResourceKind',
  'InvalidSelector',
  'EmptySelectorRequirements',
  'MissingPattern',
  'ConflictingPatternFields',
  'AnchorNotOnArray',
  'EmptyPatternArray',
  'UnknownTreeNodeType',
  'PatternTooDeep',
  'MissingPatchPath',
  'MissingPatchValue',
  'UnsupportedPatchOperation',
  'ConflictingGenerationSource',
  'MissingGenerationSource',
] as const;
export type IssueCode = (typeof ISSUE_CODES)[number];

export const PATCH_OPERATIONS = ['add', 'replace', 'remove'] as const;
export type PatchOperation = (typeof PATCH_OPERATIONS)[number];

export const SELECTOR_OPERATORS = ['In', 'NotIn', 'Exists', 'DoesNotExist'] as const;

/** Root path of every pattern walk. */
export const PATTERN_ROOT = '/';

export { DEFAULT_MAX_DEPTH } from '../types/value-tree.js';
