/**
 * Existing anchor placement.
 *
 * An existing anchor (`^(key)`) only makes sense over a list: it asserts that
 * at least one element matches. The walk visits the pattern depth-first,
 * map keys in insertion order, and stops at the first violation.
 *
 * @module
 */

import { classifyKey } from '../../anchor/anchor.js';
import type { Rule } from '../../types/policy.js';
import type { ArrayNode, MapNode, ScalarNode, ValueTree } from '../../types/value-tree.js';
import { DEFAULT_MAX_DEPTH, matchValue, valueKind } from '../../types/value-tree.js';
import { PATTERN_ROOT } from '../constants.js';
import type { PolicyValidationIssue } from '../types.js';
import { issue } from '../types.js';

export interface AnchorWalkOptions {
  /** Maximum nesting depth; the pattern root sits at depth 0. */
  maxDepth?: number;
}

interface WalkState {
  readonly maxDepth: number;
}

/**
 * Validates a single pattern tree.
 *
 * Returns the first violation, or `undefined` when the pattern is well-formed.
 * Every array in the tree must be non-empty, not only anchored ones.
 */
export function validateExistingAnchorOnPattern(
  pattern: ValueTree,
  path: string = PATTERN_ROOT,
  options: AnchorWalkOptions = {},
): PolicyValidationIssue | undefined {
  const state: WalkState = { maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH };
  return walk(pattern, path, 0, state);
}

function walk(
  node: ValueTree,
  path: string,
  depth: number,
  state: WalkState,
): PolicyValidationIssue | undefined {
  if (depth > state.maxDepth) {
    return issue(
      'PatternTooDeep',
      `pattern exceeds maximum depth of ${state.maxDepth} at ${path}`,
      { path },
    );
  }

  return matchValue(node, {
    map: (map) => walkMap(map, path, depth, state),
    array: (array) => walkArray(array, path, depth, state),
    scalar: (scalar) => checkScalar(scalar, path),
  });
}

function walkMap(
  node: MapNode,
  path: string,
  depth: number,
  state: WalkState,
): PolicyValidationIssue | undefined {
  for (const [rawKey, value] of node.entries) {
    const anchor = classifyKey(rawKey);

    if (anchor.kind === 'existing' && value.kind !== 'array') {
      return issue(
        'AnchorNotOnArray',
        `existing anchor at ${path}${anchor.raw} must be of type array, found: ${valueKind(value)}`,
        { path },
      );
    }

    const found = walk(value, `${path}${anchor.key}/`, depth + 1, state);
    if (found !== undefined) {
      return found;
    }
  }

  return undefined;
}

function walkArray(
  node: ArrayNode,
  path: string,
  depth: number,
  state: WalkState,
): PolicyValidationIssue | undefined {
  if (node.items.length === 0) {
    return issue('EmptyPatternArray', `pattern array at ${path} is empty`, { path });
  }

  for (let i = 0; i < node.items.length; i++) {
    const item = node.items[i];
    if (item === undefined) continue;

    const found = walk(item, `${path}${i}/`, depth + 1, state);
    if (found !== undefined) {
      return found;
    }
  }

  return undefined;
}

/** An existing anchor written as a value can never be bound to an array. */
function checkScalar(node: ScalarNode, path: string): PolicyValidationIssue | undefined {
  if (typeof node.value !== 'string') {
    return undefined;
  }

  const anchor = classifyKey(node.value);
  if (anchor.kind !== 'existing') {
    return undefined;
  }

  return issue(
    'AnchorNotOnArray',
    `existing anchor at ${path}${anchor.raw} must be of type array, found: string`,
    { path },
  );
}

/**
 * Runs the walk over `validate.pattern` and each `validate.anyPattern`
 * element, collecting one result per walk.
 */
export function validateExistingAnchors(
  rule: Rule,
  options: AnchorWalkOptions = {},
): PolicyValidationIssue[] {
  const issues: PolicyValidationIssue[] = [];
  const { pattern, anyPattern } = rule.validation;

  if (pattern !== undefined) {
    const found = validateExistingAnchorOnPattern(pattern, PATTERN_ROOT, options);
    if (found !== undefined) {
      issues.push({ ...found, rule: rule.name, field: 'validate.pattern' });
    }
  }

  anyPattern.forEach((alternative, i) => {
    const found = validateExistingAnchorOnPattern(alternative, PATTERN_ROOT, options);
    if (found !== undefined) {
      issues.push({ ...found, rule: rule.name, field: `validate.anyPattern[${i}]` });
    }
  });

  return issues;
}
