/**
 * Anchor key classification.
 *
 * Pattern map keys may carry a decoration that changes matching semantics,
 * e.g. `^(name)` (existing) or `=(securityContext)` (equality). Only the
 * existing anchor has structural consequences for validation.
 *
 * @module
 */

export const ANCHOR_KINDS = [
  'plain',
  'existing',
  'equality',
  'negation',
  'add-if-not-present',
  'conditional',
] as const;
export type AnchorKind = (typeof ANCHOR_KINDS)[number];

export interface AnchorClassification {
  kind: AnchorKind;
  /** Key with any anchor decoration stripped. */
  key: string;
  /** Literal key text as written in the document. */
  raw: string;
}

const PREFIXED_ANCHORS: ReadonlyMap<string, AnchorKind> = new Map([
  ['^', 'existing'],
  ['=', 'equality'],
  ['X', 'negation'],
  ['+', 'add-if-not-present'],
]);

/** Classifies a map key; O(1) apart from slicing the inner key. */
export function classifyKey(raw: string): AnchorClassification {
  if (raw.length < 3 || !raw.endsWith(')')) {
    return { kind: 'plain', key: raw, raw };
  }

  if (raw.startsWith('(')) {
    return wrap('conditional', raw.slice(1, -1), raw);
  }

  if (raw[1] === '(') {
    const kind = PREFIXED_ANCHORS.get(raw.charAt(0));
    if (kind !== undefined && raw.length > 3) {
      return wrap(kind, raw.slice(2, -1), raw);
    }
  }

  return { kind: 'plain', key: raw, raw };
}

function wrap(kind: AnchorKind, inner: string, raw: string): AnchorClassification {
  if (inner === '') {
    return { kind: 'plain', key: raw, raw };
  }
  return { kind, key: inner, raw };
}

export function isExistingAnchor(key: string): boolean {
  return classifyKey(key).kind === 'existing';
}

export function isAnchor(key: string): boolean {
  return classifyKey(key).kind !== 'plain';
}
