/**
 * Decodes a policy document tree into typed {@link Policy} records.
 *
 * Wire field names are part of the accepted document schema and are read
 * exactly as written: `spec.rules[].match.resources.kinds`,
 * `validate.pattern`, `validate.anyPattern`, `generate.clone`, and so on.
 * Pattern subtrees are kept as {@link ValueTree}s; structural checks on
 * them are left to the validator.
 *
 * Paths in error messages are dotted, e.g. `spec.rules[0].mutate.patches[1].op`.
 *
 * @module
 */

import type {
  CloneFrom,
  Generation,
  LabelSelector,
  LabelSelectorRequirement,
  Mutation,
  Patch,
  Policy,
  ResourceDescription,
  Rule,
  Validation,
} from '../types/policy.js';
import {
  emptyCloneFrom,
  emptyGeneration,
  emptyMutation,
  emptyResourceDescription,
  emptyValidation,
} from '../types/policy.js';
import type { MapNode, ValueTree } from '../types/value-tree.js';
import { valueKind } from '../types/value-tree.js';
import { PolicyDecodeError } from './errors.js';

// ---------------------------------------------------------------------------
// Primitive readers
// ---------------------------------------------------------------------------

function fieldPath(prefix: string, field: string): string {
  return prefix ? `${prefix}.${field}` : field;
}

/** Field value, treating an explicit `null` like an absent field. */
function get(map: MapNode, key: string): ValueTree | undefined {
  const value = map.entries.get(key);
  if (value === undefined || (value.kind === 'scalar' && value.value === null)) {
    return undefined;
  }
  return value;
}

function requireMap(value: ValueTree, path: string): MapNode {
  if (value.kind !== 'map') {
    throw new PolicyDecodeError(`must be an object, got ${valueKind(value)}`, path);
  }
  return value;
}

function requireArray(value: ValueTree, path: string): readonly ValueTree[] {
  if (value.kind !== 'array') {
    throw new PolicyDecodeError(`must be an array, got ${valueKind(value)}`, path);
  }
  return value.items;
}

function requireString(value: ValueTree, path: string): string {
  if (value.kind !== 'scalar' || typeof value.value !== 'string') {
    throw new PolicyDecodeError(`must be a string, got ${valueKind(value)}`, path);
  }
  return value.value;
}

function optionalMap(map: MapNode, key: string, path: string): MapNode | undefined {
  const value = get(map, key);
  return value === undefined ? undefined : requireMap(value, fieldPath(path, key));
}

function optionalString(map: MapNode, key: string, path: string): string {
  const value = get(map, key);
  return value === undefined ? '' : requireString(value, fieldPath(path, key));
}

function optionalStringList(map: MapNode, key: string, path: string): string[] {
  const value = get(map, key);
  if (value === undefined) {
    return [];
  }
  const listPath = fieldPath(path, key);
  return requireArray(value, listPath).map((item, i) => requireString(item, `${listPath}[${i}]`));
}

function optionalList<T>(
  map: MapNode,
  key: string,
  path: string,
  decode: (item: ValueTree, itemPath: string) => T,
): T[] {
  const value = get(map, key);
  if (value === undefined) {
    return [];
  }
  const listPath = fieldPath(path, key);
  return requireArray(value, listPath).map((item, i) => decode(item, `${listPath}[${i}]`));
}

// ---------------------------------------------------------------------------
// Resource descriptions
// ---------------------------------------------------------------------------

function decodeSelectorRequirement(value: ValueTree, path: string): LabelSelectorRequirement {
  const map = requireMap(value, path);
  return {
    key: optionalString(map, 'key', path),
    operator: optionalString(map, 'operator', path),
    values: optionalStringList(map, 'values', path),
  };
}

function decodeSelector(value: ValueTree, path: string): LabelSelector {
  const map = requireMap(value, path);
  const labels = optionalMap(map, 'matchLabels', path);
  const entries: [string, string][] = [];
  if (labels !== undefined) {
    for (const [key, label] of labels.entries) {
      entries.push([key, requireString(label, `${path}.matchLabels.${key}`)]);
    }
  }

  return {
    // fromEntries defines own properties, so a `__proto__` key is kept
    matchLabels: Object.fromEntries(entries),
    matchExpressions: optionalList(map, 'matchExpressions', path, decodeSelectorRequirement),
  };
}

function decodeResourceDescription(parent: MapNode, key: string, path: string): ResourceDescription {
  const block = optionalMap(parent, key, path);
  if (block === undefined) {
    return emptyResourceDescription();
  }

  const blockPath = fieldPath(path, key);
  const resources = optionalMap(block, 'resources', blockPath);
  if (resources === undefined) {
    return emptyResourceDescription();
  }

  const resourcesPath = `${blockPath}.resources`;
  const selector = get(resources, 'selector');

  return {
    kinds: optionalStringList(resources, 'kinds', resourcesPath),
    name: optionalString(resources, 'name', resourcesPath),
    namespaces: optionalStringList(resources, 'namespaces', resourcesPath),
    selector:
      selector === undefined ? undefined : decodeSelector(selector, `${resourcesPath}.selector`),
  };
}

// ---------------------------------------------------------------------------
// Rule actions
// ---------------------------------------------------------------------------

function decodePatch(value: ValueTree, path: string): Patch {
  const map = requireMap(value, path);
  return {
    path: optionalString(map, 'path', path),
    operation: optionalString(map, 'op', path),
    value: get(map, 'value'),
  };
}

function decodeMutation(rule: MapNode, path: string): Mutation {
  const block = optionalMap(rule, 'mutate', path);
  if (block === undefined) {
    return emptyMutation();
  }

  const blockPath = `${path}.mutate`;
  return {
    overlay: get(block, 'overlay'),
    patches: optionalList(block, 'patches', blockPath, decodePatch),
  };
}

function decodeValidation(rule: MapNode, path: string): Validation {
  const block = optionalMap(rule, 'validate', path);
  if (block === undefined) {
    return emptyValidation();
  }

  const blockPath = `${path}.validate`;
  return {
    message: optionalString(block, 'message', blockPath),
    pattern: get(block, 'pattern'),
    anyPattern: optionalList(block, 'anyPattern', blockPath, (item) => item),
  };
}

function decodeClone(generate: MapNode, path: string): CloneFrom {
  const block = optionalMap(generate, 'clone', path);
  if (block === undefined) {
    return emptyCloneFrom();
  }

  const blockPath = `${path}.clone`;
  return {
    namespace: optionalString(block, 'namespace', blockPath),
    name: optionalString(block, 'name', blockPath),
  };
}

function decodeGeneration(rule: MapNode, path: string): Generation {
  const block = optionalMap(rule, 'generate', path);
  if (block === undefined) {
    return emptyGeneration();
  }

  const blockPath = `${path}.generate`;
  return {
    kind: optionalString(block, 'kind', blockPath),
    name: optionalString(block, 'name', blockPath),
    data: get(block, 'data'),
    clone: decodeClone(block, blockPath),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function decodeRule(value: ValueTree, path: string): Rule {
  const rule = requireMap(value, path);
  return {
    name: optionalString(rule, 'name', path),
    matchResources: decodeResourceDescription(rule, 'match', path),
    excludeResources: decodeResourceDescription(rule, 'exclude', path),
    mutation: decodeMutation(rule, path),
    validation: decodeValidation(rule, path),
    generation: decodeGeneration(rule, path),
  };
}

/**
 * Decodes a whole policy document.
 *
 * @throws {PolicyDecodeError} When a field has the wrong shape or
 *   `spec.rules` is missing.
 */
export function decodePolicy(tree: ValueTree): Policy {
  const root = requireMap(tree, '(root)');

  const metadata = optionalMap(root, 'metadata', '');
  const name = metadata === undefined ? '' : optionalString(metadata, 'name', 'metadata');

  const spec = get(root, 'spec');
  if (spec === undefined) {
    throw new PolicyDecodeError('missing required field "spec"', '(root)');
  }
  const specMap = requireMap(spec, 'spec');

  const rules = get(specMap, 'rules');
  if (rules === undefined) {
    throw new PolicyDecodeError('missing required field "rules"', 'spec');
  }

  return {
    name: name === '' ? undefined : name,
    rules: requireArray(rules, 'spec.rules').map((rule, i) => decodeRule(rule, `spec.rules[${i}]`)),
  };
}
