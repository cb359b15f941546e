// Entity Repository - per-type view over one document
//
// A repository holds no state of its own. Every call reads or writes the
// document through the hydrator and reconciler.

import {
  isEntityRecord,
  type EntityDescriptor,
  type EntityRecord,
  type IdentityValue,
  type Path,
} from '@docmap/protocol';
import type { Document } from '@docmap/documents';
import type { EntityRegistry } from '../registry/index.js';
import type { Logger } from '../logger.js';
import { NodeNotFoundError, TypeMismatchError } from '../errors.js';
import { collectionPath, entityPath } from '../mapping/paths.js';
import { decodeIdentity, sameIdentityKey } from '../mapping/identity.js';
import { hydrate } from '../mapping/hydrate.js';
import { reconcile } from '../mapping/reconcile.js';
import { describeValue } from '../mapping/scalars.js';

/**
 * Operations on the instances of one entity type, whose identities are `I`.
 *
 * Uuid identities match stored keys without regard to case, so a node a
 * peer wrote under an uppercase key is found, updated and deleted in place.
 */
export interface EntityRepository<T, I = IdentityValue> {
  readonly descriptor: EntityDescriptor;

  /**
   * The instance stored under `identity`, or null when there is none.
   */
  find(identity: I): T | null;

  exists(identity: I): boolean;

  /**
   * Whether an instance with the identity of `instance` is stored.
   */
  contains(instance: T): boolean;

  /**
   * Map keys of the collection, in document order.
   */
  keys(): string[];

  /**
   * Lazily hydrate every instance in the collection.
   *
   * Keys are listed when the first instance is pulled. Each call returns a
   * fresh generator.
   */
  all(): Generator<T, void, undefined>;

  /**
   * Every instance, keyed by map key in ascending key order.
   */
  findAll(): Map<string, T>;

  /**
   * Insert or update `instance` under the key derived from its identity.
   */
  save(instance: T): void;

  /**
   * Remove the instance stored under `identity`.
   *
   * @throws NodeNotFoundError if there is none
   */
  delete(identity: I): void;

  /**
   * Map key for the identity carried by `instance`: the stored key when one
   * matches, otherwise the encoded identity.
   */
  keyOf(instance: T): string;
}

/**
 * Turns a hydrated record into the repository's instance type.
 * Also applied to instances before they are saved.
 */
export type InstanceParser<T> = (value: unknown, path: Path) => T;

export type EntityRepositoryOptions<T> = {
  document: Document;
  registry: EntityRegistry;
  descriptor: EntityDescriptor;
  parse: InstanceParser<T>;
  logger: Logger;
};

/**
 * Parser for untyped repositories: records pass through unchanged.
 */
export function parseEntityRecord(value: unknown, path: Path): EntityRecord {
  if (!isEntityRecord(value)) {
    throw new TypeMismatchError(path, 'record', describeValue(value));
  }
  return value;
}

export function createEntityRepository<T, I = IdentityValue>(
  options: EntityRepositoryOptions<T>
): EntityRepository<T, I> {
  const { document, registry, descriptor, parse, logger } = options;
  const collection = collectionPath(descriptor);

  const identityOf = (instance: unknown, path: Path): unknown => {
    if (!isEntityRecord(instance)) {
      throw new TypeMismatchError(path, descriptor.typeId, describeValue(instance));
    }
    return Object.hasOwn(instance, descriptor.identity.field)
      ? instance[descriptor.identity.field]
      : undefined;
  };

  // Path of the node stored for `identity`, or of the node a save would create
  const locate = (identity: unknown): Path => {
    const path = entityPath(descriptor, identity);
    const { codec } = descriptor.identity;
    if (
      codec !== 'uuid' ||
      document.nodeKind(path).type !== 'absent' ||
      document.nodeKind(collection).type !== 'map'
    ) {
      return path;
    }
    const key = String(path[path.length - 1]);
    const stored = document.listKeys(collection).find((k) => sameIdentityKey(codec, k, key));
    return stored === undefined ? path : [...collection, stored];
  };

  const load = (path: Path): T => parse(hydrate(document, registry, descriptor, path), path);

  const repository: EntityRepository<T, I> = {
    descriptor,

    find(identity) {
      const path = locate(identity);
      if (document.nodeKind(path).type === 'absent') {
        return null;
      }
      return load(path);
    },

    exists(identity) {
      return document.nodeKind(locate(identity)).type !== 'absent';
    },

    contains(instance) {
      return document.nodeKind(locate(identityOf(instance, collection))).type !== 'absent';
    },

    keys() {
      return document.listKeys(collection);
    },

    *all() {
      for (const key of document.listKeys(collection)) {
        yield load([...collection, key]);
      }
    },

    findAll() {
      const keys = document.listKeys(collection).sort(compareKeys(descriptor));
      return new Map(keys.map((key): [string, T] => [key, load([...collection, key])]));
    },

    save(instance) {
      const path = locate(identityOf(instance, collection));
      parse(instance, path);
      reconcile(document, registry, descriptor, path, instance);
      logger.debug('Saved entity', { typeId: descriptor.typeId, key: path[path.length - 1] });
    },

    delete(identity) {
      const path = locate(identity);
      if (document.nodeKind(path).type === 'absent') {
        throw new NodeNotFoundError(path);
      }
      document.delete(path);
      logger.debug('Deleted entity', { typeId: descriptor.typeId, key: path[path.length - 1] });
    },

    keyOf(instance) {
      const path = locate(identityOf(instance, collection));
      return String(path[path.length - 1]);
    },
  };

  return repository;
}

// Integer keys sort numerically, everything else by string order
function compareKeys(descriptor: EntityDescriptor): (a: string, b: string) => number {
  if (descriptor.identity.codec === 'integer') {
    return (a, b) => Number(decodeIdentity('integer', a)) - Number(decodeIdentity('integer', b));
  }
  return (a, b) => (a < b ? -1 : a > b ? 1 : 0);
}
