/**
 * Typed policy records decoded from a policy document.
 *
 * Optional groups decode to their empty value; the `is*Set` predicates tell
 * an intentionally filled group apart from an absent one.
 *
 * @module
 */

import type { ValueTree } from './value-tree.js';

export type SelectorOperator = 'In' | 'NotIn' | 'Exists' | 'DoesNotExist';

export interface LabelSelectorRequirement {
  key: string;
  /** Raw operator text; checked when the selector is compiled. */
  operator: string;
  values: string[];
}

export interface LabelSelector {
  matchLabels: Record<string, string>;
  matchExpressions: LabelSelectorRequirement[];
}

export interface ResourceDescription {
  kinds: string[];
  name: string;
  namespaces: string[];
  /** `undefined` when the document has no selector at all. */
  selector: LabelSelector | undefined;
}

export interface Patch {
  path: string;
  /** Raw `op` text; anything other than add, replace, remove is rejected. */
  operation: string;
  /** `undefined` when the document carries no value. */
  value: ValueTree | undefined;
}

export interface Mutation {
  overlay: ValueTree | undefined;
  patches: Patch[];
}

export interface Validation {
  message: string;
  pattern: ValueTree | undefined;
  anyPattern: ValueTree[];
}

export interface CloneFrom {
  namespace: string;
  name: string;
}

export interface Generation {
  kind: string;
  name: string;
  data: ValueTree | undefined;
  clone: CloneFrom;
}

export interface Rule {
  name: string;
  matchResources: ResourceDescription;
  excludeResources: ResourceDescription;
  mutation: Mutation;
  validation: Validation;
  generation: Generation;
}

export interface Policy {
  /** `metadata.name`, when present. */
  name: string | undefined;
  rules: Rule[];
}

// ---------------------------------------------------------------------------
// Empty values
// ---------------------------------------------------------------------------

export function emptyResourceDescription(): ResourceDescription {
  return { kinds: [], name: '', namespaces: [], selector: undefined };
}

export function emptyMutation(): Mutation {
  return { overlay: undefined, patches: [] };
}

export function emptyValidation(): Validation {
  return { message: '', pattern: undefined, anyPattern: [] };
}

export function emptyCloneFrom(): CloneFrom {
  return { namespace: '', name: '' };
}

export function emptyGeneration(): Generation {
  return { kind: '', name: '', data: undefined, clone: emptyCloneFrom() };
}

/** Builds a rule with every group empty, overriding the given fields. */
export function createRule(name: string, overrides: Partial<Omit<Rule, 'name'>> = {}): Rule {
  return {
    name,
    matchResources: overrides.matchResources ?? emptyResourceDescription(),
    excludeResources: overrides.excludeResources ?? emptyResourceDescription(),
    mutation: overrides.mutation ?? emptyMutation(),
    validation: overrides.validation ?? emptyValidation(),
    generation: overrides.generation ?? emptyGeneration(),
  };
}

// ---------------------------------------------------------------------------
// Presence predicates
// ---------------------------------------------------------------------------

export function isResourceDescriptionSet(rd: ResourceDescription): boolean {
  return (
    rd.kinds.length > 0 ||
    rd.name !== '' ||
    rd.namespaces.length > 0 ||
    rd.selector !== undefined
  );
}

export function isMutationSet(mutation: Mutation): boolean {
  return mutation.overlay !== undefined || mutation.patches.length > 0;
}

export function isValidationSet(validation: Validation): boolean {
  return (
    validation.message !== '' ||
    validation.pattern !== undefined ||
    validation.anyPattern.length > 0
  );
}

export function isCloneSet(clone: CloneFrom): boolean {
  return clone.namespace !== '' || clone.name !== '';
}

export function isGenerationSet(generation: Generation): boolean {
  return (
    generation.kind !== '' ||
    generation.name !== '' ||
    generation.data !== undefined ||
    isCloneSet(generation.clone)
  );
}
