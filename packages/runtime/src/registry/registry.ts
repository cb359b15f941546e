// Entity Registry - descriptors for every type the runtime can map
//
// One registry value is passed to each EntityManager. Registration is
// init-once: a type id keeps the shape it was first registered with, and a
// sealed registry accepts no new types at all.

import { isDeepStrictEqual } from 'node:util';
import { validateTypeDescriptor, type TypeDescriptor } from '@docmap/protocol';
import {
  ConflictingSchemaError,
  InvalidDescriptorError,
  RegistrySealedError,
  UnregisteredTypeError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { isTypeDefinition, type TypeDefinition } from '../schema/define.js';

export type EntityRegistryOptions = {
  logger?: Logger;
};

/**
 * Registry of type descriptors, keyed by type id.
 *
 * Stored descriptors are frozen copies and reads never mutate the registry,
 * so a sealed registry can be shared by any number of managers and documents.
 */
export class EntityRegistry {
  private descriptors = new Map<string, TypeDescriptor>();
  private sealed = false;
  private readonly logger: Logger;

  constructor(options: EntityRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Register a descriptor, or a typed definition together with the
   * definitions its nested fields use.
   *
   * Registering the same shape twice is a no-op.
   *
   * @throws InvalidDescriptorError if the descriptor is malformed
   * @throws ConflictingSchemaError if the type id is taken by a different shape
   * @throws RegistrySealedError if the registry is sealed and the shape is new
   */
  register(type: TypeDescriptor | TypeDefinition): TypeDescriptor {
    if (isTypeDefinition(type)) {
      for (const dependency of type.dependencies) {
        this.register(dependency);
      }
      return this.register(type.descriptor);
    }

    const result = validateTypeDescriptor(type);
    if (!result.valid || !result.descriptor) {
      throw new InvalidDescriptorError(
        type.typeId,
        result.errors.map((e) => `${e.path}: ${e.message}`)
      );
    }
    const descriptor = freeze(result.descriptor);

    const existing = this.descriptors.get(descriptor.typeId);
    if (existing) {
      if (isDeepStrictEqual(existing, descriptor)) {
        return existing;
      }
      throw new ConflictingSchemaError(descriptor.typeId);
    }
    if (this.sealed) {
      throw new RegistrySealedError(descriptor.typeId);
    }

    this.descriptors.set(descriptor.typeId, descriptor);
    this.logger.debug('Registered type', {
      typeId: descriptor.typeId,
      kind: descriptor.kind,
      fields: descriptor.fields.length,
    });
    return descriptor;
  }

  /**
   * Look up a descriptor.
   *
   * @throws UnregisteredTypeError if the type id was never registered
   */
  resolve(typeId: string): TypeDescriptor {
    const descriptor = this.descriptors.get(typeId);
    if (!descriptor) {
      throw new UnregisteredTypeError(typeId);
    }
    return descriptor;
  }

  has(typeId: string): boolean {
    return this.descriptors.has(typeId);
  }

  /**
   * All descriptors, in registration order.
   */
  list(): TypeDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  /**
   * Refuse any further new registrations.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}

export function createEntityRegistry(options: EntityRegistryOptions = {}): EntityRegistry {
  return new EntityRegistry(options);
}

function freeze<V>(value: V): V {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      freeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
