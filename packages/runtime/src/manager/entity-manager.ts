// Entity Manager - entry point for mapping over one document
//
// The manager owns one document handle and a registry reference for its
// lifetime. It resolves descriptors and hands out repositories; hydration
// and reconciliation happen in the repositories.

import { isDeepStrictEqual } from 'node:util';
import {
  isEntityDescriptor,
  type EntityDescriptor,
  type EntityRecord,
  type IdentityValue,
  type Path,
} from '@docmap/protocol';
import { createStagedDocument, type Document } from '@docmap/documents';
import type { EntityRegistry } from '../registry/index.js';
import type { EntityType, IdentityOf } from '../schema/define.js';
import { silentLogger, type Logger } from '../logger.js';
import {
  ConflictingSchemaError,
  InvalidDescriptorError,
  TransactionAbortedError,
  TypeMismatchError,
} from '../errors.js';
import {
  createEntityRepository,
  parseEntityRecord,
  type EntityRepository,
  type InstanceParser,
} from './entity-repository.js';
import { Transaction } from './transaction.js';

export type EntityManagerOptions = {
  registry: EntityRegistry;
  logger?: Logger;
};

/**
 * Maps registered entity types onto a document.
 *
 * @example
 * ```typescript
 * const registry = new EntityRegistry();
 * registry.register(Contact);
 *
 * const manager = new EntityManager(createYjsDocument(), { registry });
 * const contacts = manager.repository(Contact);
 * contacts.save({ id: '0b7e3c52-5d0f-4a51-9c64-2f4b7a3d9e10', name: 'ringo' });
 * ```
 */
export class EntityManager {
  private readonly doc: Document;
  private readonly types: EntityRegistry;
  private readonly logger: Logger;

  constructor(document: Document, options: EntityManagerOptions) {
    this.doc = document;
    this.types = options.registry;
    this.logger = options.logger ?? silentLogger;
  }

  get document(): Document {
    return this.doc;
  }

  get registry(): EntityRegistry {
    return this.types;
  }

  /**
   * Repository for a typed definition. Instances are parsed through its
   * schema, and identities have the type of its identity property.
   *
   * @throws UnregisteredTypeError if the type was never registered
   * @throws ConflictingSchemaError if the registry holds a different shape for it
   */
  repository<T, K extends PropertyKey>(type: EntityType<T, K>): EntityRepository<T, IdentityOf<T, K>>;

  /**
   * Untyped repository for a registered type id.
   *
   * @throws UnregisteredTypeError if the type was never registered
   * @throws InvalidDescriptorError if the type is an embeddable
   */
  repository(typeId: string): EntityRepository<EntityRecord>;

  repository<T, K extends PropertyKey>(
    type: EntityType<T, K> | string
  ): EntityRepository<T, IdentityOf<T, K>> | EntityRepository<EntityRecord> {
    if (typeof type === 'string') {
      return this.createRepository<EntityRecord, IdentityValue>(this.resolveEntity(type), parseEntityRecord);
    }

    const descriptor = this.resolveEntity(type.descriptor.typeId);
    if (!isDeepStrictEqual(descriptor, type.descriptor)) {
      throw new ConflictingSchemaError(type.descriptor.typeId);
    }
    return this.createRepository<T, IdentityOf<T, K>>(descriptor, schemaParser(type));
  }

  /**
   * Run `fn` against a staged copy of the document.
   *
   * Writes made through the transaction are applied to the document in one
   * document transaction when `fn` returns, and discarded when it throws.
   * The transaction cannot be used after `fn` returns.
   *
   * @throws TransactionAbortedError wrapping whatever `fn` threw
   */
  transact<R>(fn: (tx: Transaction) => R): R {
    const staged = createStagedDocument(this.doc);
    const scoped = new EntityManager(staged, { registry: this.types, logger: this.logger });

    let result: R;
    try {
      result = fn(new Transaction(scoped));
    } catch (error) {
      const discarded = staged.writes.length;
      staged.rollback();
      this.logger.warn('Transaction rolled back', {
        discarded,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new TransactionAbortedError(error);
    }

    const writes = staged.writes.length;
    staged.commit();
    this.logger.debug('Transaction committed', { writes });
    return result;
  }

  private resolveEntity(typeId: string): EntityDescriptor {
    const descriptor = this.types.resolve(typeId);
    if (!isEntityDescriptor(descriptor)) {
      throw new InvalidDescriptorError(typeId, ['embeddable types have no collection']);
    }
    return descriptor;
  }

  private createRepository<T, I>(descriptor: EntityDescriptor, parse: InstanceParser<T>): EntityRepository<T, I> {
    this.logger.debug('Created repository', {
      typeId: descriptor.typeId,
      collection: descriptor.collection.join('.'),
    });
    return createEntityRepository<T, I>({
      document: this.doc,
      registry: this.types,
      descriptor,
      parse,
      logger: this.logger,
    });
  }
}

export function createEntityManager(document: Document, options: EntityManagerOptions): EntityManager {
  return new EntityManager(document, options);
}

// Schema failures surface as TypeMismatchError at the first offending value
function schemaParser<T, K extends PropertyKey>(type: EntityType<T, K>): InstanceParser<T> {
  return (value: unknown, path: Path) => {
    const parsed = type.schema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new TypeMismatchError([...path, ...issue.path], 'a value accepted by the schema', issue.message);
    }
    return parsed.data;
  };
}
