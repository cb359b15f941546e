// Document node model - the shape of data inside a schemaless document tree

/**
 * A single step in a document path.
 * Strings address map keys, integers address list indexes.
 */
export type PathSegment = string | number;

/**
 * Location of a node, from the document root.
 */
export type Path = readonly PathSegment[];

/**
 * Leaf values a document can hold
 */
export type ScalarValue = string | number | boolean | Uint8Array | null;

export type ScalarKind = 'string' | 'number' | 'boolean' | 'bytes' | 'null';

/**
 * A map node, materialized as a plain object
 */
export type NodeMap = {
  [key: string]: NodeValue;
};

/**
 * Materialized value of any node in the tree.
 *
 * Values returned by a document are copies: mutating them never changes
 * the document.
 */
export type NodeValue = ScalarValue | NodeValue[] | NodeMap;

/**
 * Tagged description of what lives at a path.
 */
export type NodeKind =
  | { type: 'map' }
  | { type: 'list' }
  | { type: 'scalar'; scalar: ScalarKind }
  | { type: 'absent' };

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Uint8Array
  );
}

export function isNodeMap(value: NodeValue | undefined): value is NodeMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

export function scalarKindOf(value: ScalarValue): ScalarKind {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return 'bytes';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    default:
      return 'boolean';
  }
}

/**
 * Describe a materialized value (or its absence) as a NodeKind.
 */
export function kindOfValue(value: NodeValue | undefined): NodeKind {
  if (value === undefined) return { type: 'absent' };
  if (Array.isArray(value)) return { type: 'list' };
  if (isNodeMap(value)) return { type: 'map' };
  return { type: 'scalar', scalar: scalarKindOf(value) };
}

/**
 * Human-readable label for a NodeKind, e.g. "map" or "scalar(string)"
 */
export function describeKind(kind: NodeKind): string {
  return kind.type === 'scalar' ? `scalar(${kind.scalar})` : kind.type;
}

/**
 * Render a path for messages: `contacts.1f0c….name`, list indexes as `[2]`.
 */
export function formatPath(path: Path): string {
  if (path.length === 0) return '<root>';
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

/**
 * Deep-copy a materialized value.
 */
export function cloneNodeValue(value: NodeValue): NodeValue {
  if (value instanceof Uint8Array) return value.slice();
  if (Array.isArray(value)) return value.map(cloneNodeValue);
  if (isNodeMap(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]): [string, NodeValue] => [key, cloneNodeValue(child)])
    );
  }
  return value;
}

export function scalarsEqual(a: ScalarValue, b: ScalarValue): boolean {
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array) || !(b instanceof Uint8Array)) return false;
    if (a.length !== b.length) return false;
    return a.every((byte, i) => byte === b[i]);
  }
  return Object.is(a, b);
}
