/**
 * Generic, schema-less document tree.
 *
 * Every policy pattern is held as a {@link ValueTree}: a tagged union of maps,
 * arrays and scalars. Maps keep insertion order, which is the order in which
 * the anchor walk visits keys.
 *
 * @module
 */

export type ScalarValue = string | number | boolean | null;

export interface MapNode {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, ValueTree>;
}

export interface ArrayNode {
  readonly kind: 'array';
  readonly items: readonly ValueTree[];
}

export interface ScalarNode {
  readonly kind: 'scalar';
  readonly value: ScalarValue;
}

export type ValueTree = MapNode | ArrayNode | ScalarNode;

/** Kind names used in diagnostics (`found: string`). */
export type ValueKind = 'map' | 'array' | 'string' | 'number' | 'boolean' | 'null';

/** Error codes raised while turning untyped input into a tree. */
export type ValueTreeErrorCode = 'UnknownTreeNodeType' | 'PatternTooDeep';

export const DEFAULT_MAX_DEPTH = 100;

export class ValueTreeError extends Error {
  readonly code: ValueTreeErrorCode;
  readonly path: string;

  constructor(code: ValueTreeErrorCode, message: string, path: string) {
    super(message);
    this.name = 'ValueTreeError';
    this.code = code;
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function mapNode(
  entries: ReadonlyMap<string, ValueTree> | Iterable<readonly [string, ValueTree]>,
): MapNode {
  return { kind: 'map', entries: entries instanceof Map ? entries : new Map(entries) };
}

export function arrayNode(items: readonly ValueTree[]): ArrayNode {
  return { kind: 'array', items };
}

export function scalarNode(value: ScalarValue): ScalarNode {
  return { kind: 'scalar', value };
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

export interface ValueTreeHandlers<R> {
  map(node: MapNode): R;
  array(node: ArrayNode): R;
  scalar(node: ScalarNode): R;
}

/** Exhaustive dispatch over the three node kinds. */
export function matchValue<R>(tree: ValueTree, handlers: ValueTreeHandlers<R>): R {
  switch (tree.kind) {
    case 'map':
      return handlers.map(tree);
    case 'array':
      return handlers.array(tree);
    case 'scalar':
      return handlers.scalar(tree);
  }
}

export function valueKind(tree: ValueTree): ValueKind {
  if (tree.kind !== 'scalar') {
    return tree.kind;
  }
  const { value } = tree;
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return 'string';
  }
  return typeof value === 'number' ? 'number' : 'boolean';
}

export function isMapNode(tree: ValueTree | undefined): tree is MapNode {
  return tree !== undefined && tree.kind === 'map';
}

export function isArrayNode(tree: ValueTree | undefined): tree is ArrayNode {
  return tree !== undefined && tree.kind === 'array';
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export interface ToValueTreeOptions {
  /** Maximum nesting depth; the root sits at depth 0. */
  maxDepth?: number;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** YAML mappings may carry number or boolean keys; they read as their text. */
function mapKey(key: unknown, path: string): string {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'number' || typeof key === 'boolean') {
    return String(key);
  }
  throw new ValueTreeError(
    'UnknownTreeNodeType',
    `pattern contains a key of unknown type ${describe(key)}, path: ${path}`,
    path,
  );
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Converts parsed JS data into a {@link ValueTree}.
 *
 * Accepts plain objects, `Map`s, arrays and JSON scalars.
 * Object properties set to `undefined` are skipped.
 *
 * @throws {ValueTreeError} `UnknownTreeNodeType` for any other value,
 *   `PatternTooDeep` when nesting exceeds `maxDepth` (which includes cycles).
 */
export function toValueTree(input: unknown, options: ToValueTreeOptions = {}): ValueTree {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const convert = (value: unknown, path: string, depth: number): ValueTree => {
    if (depth > maxDepth) {
      throw new ValueTreeError(
        'PatternTooDeep',
        `pattern exceeds maximum depth of ${maxDepth} at ${path}`,
        path,
      );
    }

    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
      return scalarNode(value);
    }

    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new ValueTreeError(
          'UnknownTreeNodeType',
          `pattern contains unknown type, path: ${path}`,
          path,
        );
      }
      return scalarNode(value);
    }

    if (Array.isArray(value)) {
      return arrayNode(value.map((item: unknown, i) => convert(item, `${path}${i}/`, depth + 1)));
    }

    if (value instanceof Map) {
      const entries = new Map<string, ValueTree>();
      for (const [rawKey, item] of value) {
        const key = mapKey(rawKey, path);
        entries.set(key, convert(item, `${path}${key}/`, depth + 1));
      }
      return mapNode(entries);
    }

    if (typeof value === 'object' && isPlainObject(value)) {
      const entries = new Map<string, ValueTree>();
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        entries.set(key, convert(item, `${path}${key}/`, depth + 1));
      }
      return mapNode(entries);
    }

    throw new ValueTreeError(
      'UnknownTreeNodeType',
      `pattern contains unknown type ${describe(value)}, path: ${path}`,
      path,
    );
  };

  return convert(input, '/', 0);
}

export type JsonValue = ScalarValue | JsonValue[] | { [key: string]: JsonValue };

/** Converts a tree back into plain JSON data. */
export function fromValueTree(tree: ValueTree): JsonValue {
  return matchValue<JsonValue>(tree, {
    map: (node) => {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of node.entries) {
        out[key] = fromValueTree(item);
      }
      return out;
    },
    array: (node) => node.items.map(fromValueTree),
    scalar: (node) => node.value,
  });
}
