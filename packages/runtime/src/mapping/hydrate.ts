// Hydrator - build instances from document subtrees
//
// The subtree is read with a single document.get, so one hydrate call sees
// one consistent snapshot. Hydration never writes and never returns a
// partially built instance: the first problem found is thrown.

import {
  describeKind,
  isEntityDescriptor,
  isNodeMap,
  kindOfValue,
  type EntityRecord,
  type FieldKind,
  type NodeValue,
  type Path,
  type TypeDescriptor,
} from '@docmap/protocol';
import type { Document } from '@docmap/documents';
import type { EntityRegistry } from '../registry/index.js';
import {
  InvalidIdentityError,
  MissingFieldError,
  NodeNotFoundError,
  ShapeMismatchError,
} from '../errors.js';
import { decodeIdentity } from './identity.js';
import { decodeScalar } from './scalars.js';

/**
 * Hydrate the map node at `path` as an instance of `descriptor`.
 *
 * For entity types the identity comes from the last path segment, never
 * from the node's content. An entity nested inside another instance is not
 * a collection entry, so its identity is read from the child named after
 * its identity field. Keys the descriptor does not name are ignored.
 *
 * @throws NodeNotFoundError if nothing exists at `path`
 * @throws ShapeMismatchError if a node has the wrong structure
 * @throws MissingFieldError if a required field is absent
 * @throws TypeMismatchError if a scalar has the wrong type
 */
export function hydrate(
  document: Document,
  registry: EntityRegistry,
  descriptor: TypeDescriptor,
  path: Path
): EntityRecord {
  const node = document.get(path);
  if (node === undefined) {
    throw new NodeNotFoundError(path);
  }
  return hydrateNode(registry, descriptor, node, path, false);
}

function hydrateNode(
  registry: EntityRegistry,
  descriptor: TypeDescriptor,
  node: NodeValue,
  path: Path,
  nested: boolean
): EntityRecord {
  if (!isNodeMap(node)) {
    throw new ShapeMismatchError(path, 'map', describeKind(kindOfValue(node)));
  }

  const record: EntityRecord = {};

  if (isEntityDescriptor(descriptor)) {
    const { field, codec } = descriptor.identity;
    if (nested) {
      const stored = Object.hasOwn(node, field) ? node[field] : undefined;
      if (stored === undefined || stored === null) {
        throw new MissingFieldError(descriptor.typeId, field, path);
      }
      if (typeof stored !== 'string') {
        throw new ShapeMismatchError([...path, field], 'scalar(string)', describeKind(kindOfValue(stored)));
      }
      record[field] = decodeIdentity(codec, stored);
    } else {
      if (path.length === 0) {
        throw new InvalidIdentityError(undefined, `${descriptor.typeId} at the document root has no map key`);
      }
      record[field] = decodeIdentity(codec, String(path[path.length - 1]));
    }
  }

  for (const field of descriptor.fields) {
    const child = Object.hasOwn(node, field.key) ? node[field.key] : undefined;
    if (child === undefined || (child === null && field.optional)) {
      if (field.optional) continue;
      throw new MissingFieldError(descriptor.typeId, field.name, path);
    }
    record[field.name] = hydrateValue(registry, field.kind, child, [...path, field.key]);
  }

  return record;
}

function hydrateValue(registry: EntityRegistry, kind: FieldKind, node: NodeValue, path: Path): unknown {
  switch (kind.type) {
    case 'scalar':
      if (Array.isArray(node) || isNodeMap(node)) {
        throw new ShapeMismatchError(path, `scalar(${kind.scalar})`, describeKind(kindOfValue(node)));
      }
      return decodeScalar(kind.scalar, node, path);

    case 'entity':
      return hydrateNode(registry, registry.resolve(kind.entity), node, path, true);

    case 'list':
      if (!Array.isArray(node)) {
        throw new ShapeMismatchError(path, 'list', describeKind(kindOfValue(node)));
      }
      return node.map((item, i) => hydrateValue(registry, kind.items, item, [...path, i]));

    case 'record':
      if (!isNodeMap(node)) {
        throw new ShapeMismatchError(path, 'map', describeKind(kindOfValue(node)));
      }
      return Object.fromEntries(
        Object.entries(node).map(([key, child]): [string, unknown] => [
          key,
          hydrateValue(registry, kind.values, child, [...path, key]),
        ])
      );
  }
}
