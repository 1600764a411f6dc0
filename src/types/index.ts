// Value tree
export {
  DEFAULT_MAX_DEPTH,
  ValueTreeError,
  mapNode,
  arrayNode,
  scalarNode,
  matchValue,
  valueKind,
  isMapNode,
  isArrayNode,
  toValueTree,
  fromValueTree,
} from './value-tree.js';
export type {
  ScalarValue,
  MapNode,
  ArrayNode,
  ScalarNode,
  ValueTree,
  ValueKind,
  ValueTreeErrorCode,
  ValueTreeHandlers,
  ToValueTreeOptions,
  JsonValue,
} from './value-tree.js';

// Policy
export {
  emptyResourceDescription,
  emptyMutation,
  emptyValidation,
  emptyCloneFrom,
  emptyGeneration,
  createRule,
  isResourceDescriptionSet,
  isMutationSet,
  isValidationSet,
  isCloneSet,
  isGenerationSet,
} from './policy.js';
export type {
  SelectorOperator,
  LabelSelectorRequirement,
  LabelSelector,
  ResourceDescription,
  Patch,
  Mutation,
  Validation,
  CloneFrom,
  Generation,
  Rule,
  Policy,
} from './policy.js';
