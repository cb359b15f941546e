// In-memory document implementation for development and testing
//
// This module provides a plain tree document, useful for:
// - Fast unit testing of mappings
// - Local development without a CRDT store
// - Staging writes before they reach another document
//
// Data does not persist between restarts and has no merge semantics.

import {
  scalarKindOf,
  type NodeKind,
  type NodeMap,
  type NodeValue,
  type Path,
  type PathSegment,
  type ScalarValue,
} from '@docmap/protocol';
import type { Document } from '../interfaces/index.js';
import { DocumentShapeError } from '../errors.js';

type MemoryNode = ScalarValue | MemoryNode[] | Map<string, MemoryNode>;

/**
 * In-memory document with inspection helpers.
 */
export type InMemoryDocument = Document & {
  /** Copy of the whole tree (for debugging/testing) */
  snapshot(): NodeMap;
  /** Remove everything */
  clear(): void;
};

function toMemory(value: NodeValue): MemoryNode {
  if (value instanceof Uint8Array) return value.slice();
  if (Array.isArray(value)) return value.map(toMemory);
  if (value !== null && typeof value === 'object') {
    return new Map(Object.entries(value).map(([key, child]): [string, MemoryNode] => [key, toMemory(child)]));
  }
  return value;
}

function mapToObject(map: Map<string, MemoryNode>): NodeMap {
  return Object.fromEntries(
    Array.from(map.entries()).map(([key, child]): [string, NodeValue] => [key, fromMemory(child)])
  );
}

function fromMemory(node: MemoryNode): NodeValue {
  if (node instanceof Map) return mapToObject(node);
  if (node instanceof Uint8Array) return node.slice();
  if (Array.isArray(node)) return node.map(fromMemory);
  return node;
}

function isListIndex(segment: PathSegment, list: MemoryNode[]): segment is number {
  return typeof segment === 'number' && Number.isInteger(segment) && segment >= 0 && segment < list.length;
}

function childOf(node: MemoryNode | undefined, segment: PathSegment): MemoryNode | undefined {
  if (node instanceof Map) {
    return typeof segment === 'string' ? node.get(segment) : undefined;
  }
  if (Array.isArray(node)) {
    return isListIndex(segment, node) ? node[segment] : undefined;
  }
  return undefined;
}

/**
 * Create an in-memory document.
 *
 * @example
 * ```typescript
 * const doc = createInMemoryDocument();
 *
 * doc.put(['contacts', 'c-1', 'name'], 'ringo');
 * doc.listKeys(['contacts']); // ['c-1']
 *
 * // Inspect the whole tree
 * console.log(doc.snapshot());
 * ```
 */
export function createInMemoryDocument(initial: NodeMap = {}): InMemoryDocument {
  let root = new Map<string, MemoryNode>();

  const load = (value: NodeMap) => {
    const node = toMemory(value);
    root = node instanceof Map ? node : new Map();
  };
  load(initial);

  const resolve = (path: Path): MemoryNode | undefined => {
    let node: MemoryNode | undefined = root;
    for (const segment of path) {
      node = childOf(node, segment);
      if (node === undefined) return undefined;
    }
    return node;
  };

  // Walk to the parent of `path`, creating missing maps on the way
  const parentFor = (path: Path): MemoryNode => {
    let node: MemoryNode = root;
    for (let i = 0; i < path.length - 1; i++) {
      const segment = path[i];
      if (node instanceof Map) {
        if (typeof segment !== 'string') {
          throw new DocumentShapeError(path.slice(0, i + 1), 'map addressed by index');
        }
        let next = node.get(segment);
        if (next === undefined) {
          next = new Map<string, MemoryNode>();
          node.set(segment, next);
        }
        node = next;
      } else if (Array.isArray(node)) {
        if (!isListIndex(segment, node)) {
          throw new DocumentShapeError(path.slice(0, i + 1), 'list index out of range');
        }
        node = node[segment];
      } else {
        throw new DocumentShapeError(path.slice(0, i), 'intermediate node is a scalar');
      }
    }
    return node;
  };

  return {
    get(path) {
      const node = resolve(path);
      return node === undefined ? undefined : fromMemory(node);
    },

    put(path, value) {
      if (path.length === 0) {
        if (value === null || typeof value !== 'object' || Array.isArray(value) || value instanceof Uint8Array) {
          throw new DocumentShapeError(path, 'the root must be a map');
        }
        load(value);
        return;
      }

      const parent = parentFor(path);
      const segment = path[path.length - 1];
      if (parent instanceof Map) {
        if (typeof segment !== 'string') {
          throw new DocumentShapeError(path, 'map addressed by index');
        }
        parent.set(segment, toMemory(value));
      } else if (Array.isArray(parent)) {
        if (isListIndex(segment, parent)) {
          parent[segment] = toMemory(value);
        } else if (segment === parent.length) {
          parent.push(toMemory(value));
        } else {
          throw new DocumentShapeError(path, 'list index out of range');
        }
      } else {
        throw new DocumentShapeError(path.slice(0, -1), 'parent node is a scalar');
      }
    },

    delete(path) {
      if (path.length === 0) return;
      const parent = resolve(path.slice(0, -1));
      const segment = path[path.length - 1];
      if (parent instanceof Map && typeof segment === 'string') {
        parent.delete(segment);
      } else if (Array.isArray(parent) && isListIndex(segment, parent)) {
        parent.splice(segment, 1);
      }
    },

    listKeys(path) {
      const node = resolve(path);
      if (node === undefined) return [];
      if (!(node instanceof Map)) {
        throw new DocumentShapeError(path, 'node is not a map');
      }
      return Array.from(node.keys());
    },

    listItems(path) {
      const node = resolve(path);
      if (node === undefined) return [];
      if (!Array.isArray(node)) {
        throw new DocumentShapeError(path, 'node is not a list');
      }
      return node.map(fromMemory);
    },

    nodeKind(path): NodeKind {
      const node = resolve(path);
      if (node === undefined) return { type: 'absent' };
      if (node instanceof Map) return { type: 'map' };
      if (Array.isArray(node)) return { type: 'list' };
      return { type: 'scalar', scalar: scalarKindOf(node) };
    },

    transact(fn) {
      return fn();
    },

    snapshot() {
      return mapToObject(root);
    },

    clear() {
      root = new Map();
    },
  };
}
