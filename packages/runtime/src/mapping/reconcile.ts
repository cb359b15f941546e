// Reconciler - write instances into document subtrees
//
// Reconciliation edits a subtree key by key. It never replaces the node at
// `path`, so keys the descriptor does not name survive, and it writes a
// scalar only when the stored value differs. Writes already applied stay in
// place when a later field fails.

import {
  describeKind,
  isEntityDescriptor,
  isEntityRecord,
  isScalarValue,
  scalarsEqual,
  type FieldKind,
  type NodeValue,
  type Path,
  type TypeDescriptor,
} from '@docmap/protocol';
import { DocumentShapeError, type Document } from '@docmap/documents';
import type { EntityRegistry } from '../registry/index.js';
import { MissingFieldError, ShapeMismatchError, TypeMismatchError } from '../errors.js';
import { encodeIdentity } from './identity.js';
import { describeValue, encodeScalar } from './scalars.js';

type Container = 'map' | 'list';

/**
 * Reconcile `instance` into the map node at `path`.
 *
 * The identity of an entity is the last segment of `path` and is never
 * written as a field. Absent optional fields are deleted from the node.
 *
 * @throws ShapeMismatchError if a node has the wrong structure or the document rejects a write
 * @throws MissingFieldError if the instance lacks a required field
 * @throws TypeMismatchError if an instance value has the wrong type
 */
export function reconcile(
  document: Document,
  registry: EntityRegistry,
  descriptor: TypeDescriptor,
  path: Path,
  instance: unknown
): void {
  reconcileNode(document, registry, descriptor, path, instance, 'map', false);
}

// A nested entity is not a collection entry; its identity is written under
// its identity field.
function reconcileNode(
  document: Document,
  registry: EntityRegistry,
  descriptor: TypeDescriptor,
  path: Path,
  instance: unknown,
  container: Container,
  nested: boolean
): void {
  if (!isEntityRecord(instance)) {
    throw new TypeMismatchError(path, descriptor.typeId, describeValue(instance));
  }

  ensureNode(document, path, 'map', container);

  if (nested && isEntityDescriptor(descriptor)) {
    const { field, codec } = descriptor.identity;
    const identity = Object.hasOwn(instance, field) ? instance[field] : undefined;
    if (identity === undefined || identity === null) {
      throw new MissingFieldError(descriptor.typeId, field, path);
    }
    const key = encodeIdentity(codec, identity);
    const identityPath = [...path, field];
    if (document.get(identityPath) !== key) {
      write(document, 'map', () => document.put(identityPath, key));
    }
  }

  for (const field of descriptor.fields) {
    const value = Object.hasOwn(instance, field.name) ? instance[field.name] : undefined;
    const childPath = [...path, field.key];

    if (value === undefined || value === null) {
      if (!field.optional) {
        throw new MissingFieldError(descriptor.typeId, field.name, path);
      }
      if (document.nodeKind(childPath).type !== 'absent') {
        write(document, 'map', () => document.delete(childPath));
      }
      continue;
    }

    reconcileValue(document, registry, field.kind, childPath, value, 'map');
  }
}

function reconcileValue(
  document: Document,
  registry: EntityRegistry,
  kind: FieldKind,
  path: Path,
  value: unknown,
  container: Container
): void {
  switch (kind.type) {
    case 'scalar': {
      const encoded = encodeScalar(kind.scalar, value, path);
      const current = document.get(path);
      if (current !== undefined && isScalarValue(current) && scalarsEqual(current, encoded)) {
        return;
      }
      write(document, container, () => document.put(path, encoded));
      return;
    }

    case 'entity':
      reconcileNode(document, registry, registry.resolve(kind.entity), path, value, container, true);
      return;

    case 'list': {
      if (!Array.isArray(value)) {
        throw new TypeMismatchError(path, 'list', describeValue(value));
      }
      ensureNode(document, path, 'list', container);
      value.forEach((item, i) => reconcileValue(document, registry, kind.items, [...path, i], item, 'list'));

      const length = document.listItems(path).length;
      for (let i = length - 1; i >= value.length; i--) {
        const itemPath = [...path, i];
        write(document, 'list', () => document.delete(itemPath));
      }
      return;
    }

    case 'record': {
      if (!isEntityRecord(value)) {
        throw new TypeMismatchError(path, 'record', describeValue(value));
      }
      ensureNode(document, path, 'map', container);

      for (const [key, child] of Object.entries(value)) {
        if (child !== undefined) {
          reconcileValue(document, registry, kind.values, [...path, key], child, 'map');
        }
      }
      for (const key of document.listKeys(path)) {
        if (!Object.hasOwn(value, key) || value[key] === undefined) {
          const childPath = [...path, key];
          write(document, 'map', () => document.delete(childPath));
        }
      }
      return;
    }
  }
}

/**
 * Make sure a map or list exists at `path`, creating an empty one when absent.
 */
function ensureNode(document: Document, path: Path, type: Container, container: Container): void {
  const kind = document.nodeKind(path);
  if (kind.type === type) return;
  if (kind.type !== 'absent') {
    throw new ShapeMismatchError(path, type, describeKind(kind));
  }
  const empty: NodeValue = type === 'map' ? {} : [];
  write(document, container, () => document.put(path, empty));
}

/**
 * Apply a document write into a node of kind `container`, reporting
 * structural rejections as ShapeMismatchError.
 */
function write(document: Document, container: Container, apply: () => void): void {
  try {
    apply();
  } catch (error) {
    if (error instanceof DocumentShapeError) {
      throw new ShapeMismatchError(error.path, container, describeKind(document.nodeKind(error.path)), error);
    }
    throw error;
  }
}
