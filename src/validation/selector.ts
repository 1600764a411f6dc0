/**
 * Label selector compilation.
 *
 * Turns `matchLabels` and `matchExpressions` into a flat requirement list,
 * rejecting malformed keys, values and operators.
 *
 * @module
 */

import type { LabelSelector, SelectorOperator } from '../types/policy.js';
import { SELECTOR_OPERATORS } from './constants.js';

export interface LabelRequirement {
  key: string;
  operator: SelectorOperator;
  values: string[];
}

export class SelectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectorError';
  }
}

const OPERATORS: ReadonlySet<string> = new Set(SELECTOR_OPERATORS);

const NAME_MAX_LENGTH = 63;
const PREFIX_MAX_LENGTH = 253;
const NAME_RE = /^[A-Za-z0-9]([-A-Za-z0-9_.]*[A-Za-z0-9])?$/;
const DNS_LABEL_RE = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

function isSelectorOperator(value: string): value is SelectorOperator {
  return OPERATORS.has(value);
}

function isDnsSubdomain(value: string): boolean {
  return (
    value.length > 0 &&
    value.length <= PREFIX_MAX_LENGTH &&
    value.split('.').every((label) => label.length <= NAME_MAX_LENGTH && DNS_LABEL_RE.test(label))
  );
}

/** Returns an error text, or `undefined` for a valid qualified label key. */
export function checkLabelKey(key: string): string | undefined {
  const parts = key.split('/');
  let name: string;

  if (parts.length === 1) {
    name = key;
  } else if (parts.length === 2) {
    const [prefix = '', rest = ''] = parts;
    if (!isDnsSubdomain(prefix)) {
      return `invalid label key "${key}": prefix must be a DNS subdomain`;
    }
    name = rest;
  } else {
    return `invalid label key "${key}": at most one "/" is allowed`;
  }

  if (name.length === 0 || name.length > NAME_MAX_LENGTH || !NAME_RE.test(name)) {
    return `invalid label key "${key}": name must be 1-${NAME_MAX_LENGTH} alphanumeric characters, '-', '_' or '.'`;
  }
  return undefined;
}

/** Returns an error text, or `undefined` for a valid label value. */
export function checkLabelValue(value: string): string | undefined {
  if (value === '') {
    return undefined;
  }
  if (value.length > NAME_MAX_LENGTH || !NAME_RE.test(value)) {
    return `invalid label value "${value}": must be at most ${NAME_MAX_LENGTH} alphanumeric characters, '-', '_' or '.'`;
  }
  return undefined;
}

function requirement(key: string, operator: string, values: readonly string[]): LabelRequirement {
  const keyError = checkLabelKey(key);
  if (keyError !== undefined) {
    throw new SelectorError(keyError);
  }

  if (!isSelectorOperator(operator)) {
    throw new SelectorError(`"${operator}" is not a valid label selector operator`);
  }

  switch (operator) {
    case 'In':
    case 'NotIn':
      if (values.length === 0) {
        throw new SelectorError(`values: for 'In', 'NotIn' operators, values set can't be empty`);
      }
      break;
    case 'Exists':
    case 'DoesNotExist':
      if (values.length !== 0) {
        throw new SelectorError(`values: values set must be empty for exists and does not exist`);
      }
      break;
  }

  for (const value of values) {
    const valueError = checkLabelValue(value);
    if (valueError !== undefined) {
      throw new SelectorError(valueError);
    }
  }

  return { key, operator, values: [...values].sort() };
}

/**
 * Compiles a selector into requirements sorted by key.
 *
 * @throws {SelectorError} On an invalid key, value or operator.
 */
export function compileSelector(selector: LabelSelector): LabelRequirement[] {
  const requirements: LabelRequirement[] = [];

  for (const [key, value] of Object.entries(selector.matchLabels)) {
    requirements.push(requirement(key, 'In', [value]));
  }

  for (const expr of selector.matchExpressions) {
    requirements.push(requirement(expr.key, expr.operator, expr.values));
  }

  return requirements.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}
