// Yjs document implementation
//
// Maps the addressable document contract onto a shared Y.Map root:
// maps are Y.Map, lists are Y.Array, scalars are stored as plain values.
// Y.Text reads as a string scalar. Every write runs inside Y.Doc.transact,
// so observers and update listeners see one change per mutation (or one per
// `transact` call when writes are grouped).

import * as Y from 'yjs';
import {
  isScalarValue,
  scalarKindOf,
  type NodeKind,
  type NodeMap,
  type NodeValue,
  type Path,
  type PathSegment,
} from '@docmap/protocol';
import type { Document } from '../interfaces/index.js';
import { DocumentShapeError } from '../errors.js';

export type YjsDocumentOptions = {
  /** Name of the shared root map (default "root") */
  rootName?: string;

  /** Transaction origin attached to every write */
  origin?: unknown;
};

/**
 * Document backed by a Y.Doc, with access to the underlying Yjs objects.
 */
export type YjsDocument = Document & {
  readonly doc: Y.Doc;
  readonly root: Y.Map<unknown>;
};

function isListIndex(segment: PathSegment, list: Y.Array<unknown>): segment is number {
  return typeof segment === 'number' && Number.isInteger(segment) && segment >= 0 && segment < list.length;
}

function childOf(node: unknown, segment: PathSegment): unknown {
  if (node instanceof Y.Map) {
    return typeof segment === 'string' ? node.get(segment) : undefined;
  }
  if (node instanceof Y.Array) {
    return isListIndex(segment, node) ? node.get(segment) : undefined;
  }
  return undefined;
}

function toYjs(value: NodeValue): unknown {
  if (value instanceof Uint8Array) return value.slice();
  if (Array.isArray(value)) return Y.Array.from(value.map(toYjs));
  if (value !== null && typeof value === 'object') {
    return new Y.Map<unknown>(Object.entries(value).map(([key, child]): [string, unknown] => [key, toYjs(child)]));
  }
  return value;
}

function materialize(node: unknown, path: Path): NodeValue {
  if (node instanceof Y.Map) {
    const entries: [string, NodeValue][] = [];
    node.forEach((child: unknown, key: string) => {
      entries.push([key, materialize(child, [...path, key])]);
    });
    return Object.fromEntries(entries);
  }
  if (node instanceof Y.Array) {
    return node.toArray().map((child: unknown, i: number) => materialize(child, [...path, i]));
  }
  if (node instanceof Y.Text) return node.toString();
  if (node instanceof Uint8Array) return node.slice();
  if (isScalarValue(node)) return node;
  throw new DocumentShapeError(path, 'unsupported Yjs content');
}

/**
 * Create a document over a Y.Doc.
 *
 * @example
 * ```typescript
 * const ydoc = new Y.Doc();
 * const doc = createYjsDocument(ydoc, { origin: 'docmap' });
 *
 * doc.put(['contacts', 'c-1', 'name'], 'ringo');
 * ydoc.getMap('root').toJSON(); // { contacts: { 'c-1': { name: 'ringo' } } }
 * ```
 */
export function createYjsDocument(doc: Y.Doc = new Y.Doc(), options: YjsDocumentOptions = {}): YjsDocument {
  const root = doc.getMap<unknown>(options.rootName ?? 'root');
  const origin = options.origin ?? null;

  const resolve = (path: Path): unknown => {
    let node: unknown = root;
    for (const segment of path) {
      node = childOf(node, segment);
      if (node === undefined) return undefined;
    }
    return node;
  };

  // Walk to the parent of `path`, creating missing maps on the way
  const parentFor = (path: Path): unknown => {
    let node: unknown = root;
    for (let i = 0; i < path.length - 1; i++) {
      const segment = path[i];
      if (node instanceof Y.Map) {
        if (typeof segment !== 'string') {
          throw new DocumentShapeError(path.slice(0, i + 1), 'map addressed by index');
        }
        let next: unknown = node.get(segment);
        if (next === undefined) {
          next = new Y.Map<unknown>();
          node.set(segment, next);
        }
        node = next;
      } else if (node instanceof Y.Array) {
        if (!isListIndex(segment, node)) {
          throw new DocumentShapeError(path.slice(0, i + 1), 'list index out of range');
        }
        node = node.get(segment);
      } else {
        throw new DocumentShapeError(path.slice(0, i), 'intermediate node is not a map');
      }
    }
    return node;
  };

  const write = (path: Path, value: NodeValue) => {
    if (path.length === 0) {
      if (value === null || typeof value !== 'object' || Array.isArray(value) || value instanceof Uint8Array) {
        throw new DocumentShapeError(path, 'the root must be a map');
      }
      for (const key of Array.from(root.keys())) root.delete(key);
      for (const [key, child] of Object.entries(value)) root.set(key, toYjs(child));
      return;
    }

    const parent = parentFor(path);
    const segment = path[path.length - 1];
    if (parent instanceof Y.Map) {
      if (typeof segment !== 'string') {
        throw new DocumentShapeError(path, 'map addressed by index');
      }
      parent.set(segment, toYjs(value));
    } else if (parent instanceof Y.Array) {
      if (isListIndex(segment, parent)) {
        parent.delete(segment, 1);
        parent.insert(segment, [toYjs(value)]);
      } else if (segment === parent.length) {
        parent.push([toYjs(value)]);
      } else {
        throw new DocumentShapeError(path, 'list index out of range');
      }
    } else {
      throw new DocumentShapeError(path.slice(0, -1), 'parent node is not a map');
    }
  };

  return {
    doc,
    root,

    get(path) {
      const node = resolve(path);
      return node === undefined ? undefined : materialize(node, path);
    },

    put(path, value) {
      doc.transact(() => write(path, value), origin);
    },

    delete(path) {
      if (path.length === 0) return;
      const parent = resolve(path.slice(0, -1));
      const segment = path[path.length - 1];
      doc.transact(() => {
        if (parent instanceof Y.Map && typeof segment === 'string') {
          parent.delete(segment);
        } else if (parent instanceof Y.Array && isListIndex(segment, parent)) {
          parent.delete(segment, 1);
        }
      }, origin);
    },

    listKeys(path) {
      const node = resolve(path);
      if (node === undefined) return [];
      if (!(node instanceof Y.Map)) {
        throw new DocumentShapeError(path, 'node is not a map');
      }
      return Array.from(node.keys());
    },

    listItems(path) {
      const node = resolve(path);
      if (node === undefined) return [];
      if (!(node instanceof Y.Array)) {
        throw new DocumentShapeError(path, 'node is not a list');
      }
      return node.toArray().map((child: unknown, i: number) => materialize(child, [...path, i]));
    },

    nodeKind(path): NodeKind {
      const node = resolve(path);
      if (node === undefined) return { type: 'absent' };
      if (node instanceof Y.Map) return { type: 'map' };
      if (node instanceof Y.Array) return { type: 'list' };
      if (node instanceof Y.Text) return { type: 'scalar', scalar: 'string' };
      if (isScalarValue(node)) return { type: 'scalar', scalar: scalarKindOf(node) };
      throw new DocumentShapeError(path, 'unsupported Yjs content');
    },

    transact(fn) {
      return doc.transact(() => fn(), origin);
    },
  };
}

/**
 * Materialize the whole root map of a Y.Doc.
 */
export function snapshotYjs(doc: Y.Doc, rootName = 'root'): NodeMap {
  const entries: [string, NodeValue][] = [];
  doc.getMap<unknown>(rootName).forEach((child: unknown, key: string) => {
    entries.push([key, materialize(child, [key])]);
  });
  return Object.fromEntries(entries);
}
