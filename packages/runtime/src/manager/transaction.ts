// Transaction - grouped writes over a staged document
//
// A Transaction is handed to the callback of EntityManager.transact. Its
// reads see its own writes; nothing reaches the manager's document until
// the callback returns.

import type { EntityType, IdentityOf } from '../schema/define.js';
import { EntityAlreadyExistsError, KeyMismatchError, NodeNotFoundError } from '../errors.js';
import { collectionPath } from '../mapping/paths.js';
import { encodeIdentity } from '../mapping/identity.js';
import type { EntityRepository } from './entity-repository.js';

/**
 * Source of typed repositories over the transaction's document
 */
export type RepositorySource = {
  repository<T, K extends PropertyKey>(type: EntityType<T, K>): EntityRepository<T, IdentityOf<T, K>>;
};

export class Transaction {
  constructor(private readonly source: RepositorySource) {}

  repository<T, K extends PropertyKey>(type: EntityType<T, K>): EntityRepository<T, IdentityOf<T, K>> {
    return this.source.repository(type);
  }

  find<T, K extends PropertyKey>(type: EntityType<T, K>, identity: IdentityOf<T, K>): T | null {
    return this.source.repository(type).find(identity);
  }

  /**
   * @throws EntityAlreadyExistsError if an instance with the same identity exists
   */
  insert<T>(type: EntityType<T>, instance: T): void {
    const repository = this.source.repository(type);
    if (repository.contains(instance)) {
      throw new EntityAlreadyExistsError(type.descriptor.typeId, repository.keyOf(instance));
    }
    repository.save(instance);
  }

  /**
   * @throws NodeNotFoundError if no instance with the same identity exists
   */
  update<T>(type: EntityType<T>, instance: T): void {
    const repository = this.source.repository(type);
    if (!repository.contains(instance)) {
      throw new NodeNotFoundError([...collectionPath(type.descriptor), repository.keyOf(instance)]);
    }
    repository.save(instance);
  }

  upsert<T>(type: EntityType<T>, instance: T): void {
    this.source.repository(type).save(instance);
  }

  /**
   * Return the instance stored under `identity`, inserting `create()` when
   * there is none.
   *
   * @throws KeyMismatchError if the created instance carries another identity
   */
  getOrInsert<T, K extends PropertyKey>(type: EntityType<T, K>, identity: IdentityOf<T, K>, create: () => T): T {
    const repository = this.source.repository(type);
    const existing = repository.find(identity);
    if (existing !== null) {
      return existing;
    }

    const created = create();
    const expected = encodeIdentity(type.descriptor.identity.codec, identity);
    const actual = repository.keyOf(created);
    if (actual !== expected) {
      throw new KeyMismatchError(type.descriptor.typeId, expected, actual);
    }
    repository.save(created);
    return created;
  }

  /**
   * Remove the instance stored under `identity`, if any.
   *
   * @returns whether an instance was removed
   */
  remove<T, K extends PropertyKey>(type: EntityType<T, K>, identity: IdentityOf<T, K>): boolean {
    const repository = this.source.repository(type);
    if (!repository.exists(identity)) {
      return false;
    }
    repository.delete(identity);
    return true;
  }
}
