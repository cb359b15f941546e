// Schema definition - typed entity declarations on zod
//
// defineEntity/defineEmbeddable read a zod shape and produce the data-only
// TypeDescriptor the registry, hydrator and reconciler work with. The
// instance type is whatever zod infers for the shape, and hydrated records
// are parsed through the same schema before they reach callers.

import { z } from 'zod';
import {
  validateTypeDescriptor,
  type EmbeddableDescriptor,
  type EntityDescriptor,
  type FieldDescriptor,
  type FieldKind,
  type IdentityCodecName,
  type IdentityValue,
  type TypeDescriptor,
} from '@docmap/protocol';
import { InvalidDescriptorError } from '../errors.js';

/**
 * Anything the registry can register along with what it depends on.
 */
export type TypeDefinition = {
  readonly descriptor: TypeDescriptor;
  readonly dependencies: readonly TypeDefinition[];
};

/**
 * A typed entity definition. `K` is the instance property holding the identity.
 */
export type EntityType<T, K extends PropertyKey = PropertyKey> = TypeDefinition & {
  readonly descriptor: EntityDescriptor;
  readonly identity: K;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  parse(value: unknown): T;
};

export type EmbeddableType<T> = TypeDefinition & {
  readonly descriptor: EmbeddableDescriptor;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  parse(value: unknown): T;
};

/**
 * Identity values accepted for instances of `T` whose identity is `T[K]`.
 *
 * Declaring the identity with a branded schema, such as
 * `z.string().uuid().brand<'ContactId'>()`, keeps identities of one type
 * from being passed where another type's are expected.
 */
export type IdentityOf<T, K extends PropertyKey> = [K] extends [keyof T]
  ? Extract<T[K], IdentityValue>
  : IdentityValue;

/**
 * Output type zod infers for a raw shape
 */
export type ShapeOutput<S extends z.ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, 'strip'>;

/**
 * Instance type of a definition.
 *
 * @example
 * ```typescript
 * type Contact = Infer<typeof Contact>;
 * ```
 */
export type Infer<D> = D extends EntityType<infer T> ? T : D extends EmbeddableType<infer T> ? T : never;

export type EntityConfig<S extends z.ZodRawShape, K extends keyof S & string> = {
  /** Type id, also the source of the default collection name */
  name: string;

  /** Collection path; defaults to the snake_case form of `name` */
  collection?: string | string[];

  /** Shape property holding the identity */
  identity: K;

  fields: S;

  /** Document keys for properties whose key differs from the property name */
  keys?: Record<string, string>;
};

export type EmbeddableConfig<S extends z.ZodRawShape> = {
  name: string;
  fields: S;
  keys?: Record<string, string>;
};

// Schemas created by defineEntity/defineEmbeddable, for nested lookups
const definitions = new WeakMap<z.ZodTypeAny, TypeDefinition>();

// Schemas created by bytes()
const bytesSchemas = new WeakSet<z.ZodTypeAny>();

/**
 * Schema for a byte sequence field.
 */
export function bytes(): z.ZodType<Uint8Array, z.ZodTypeDef, Uint8Array> {
  const schema = z.custom<Uint8Array>((value) => value instanceof Uint8Array, 'Expected Uint8Array');
  bytesSchemas.add(schema);
  return schema;
}

export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[-\s]+/g, '_')
    .toLowerCase();
}

function schemaName(schema: z.ZodTypeAny): string {
  return schema.constructor.name;
}

/**
 * Map a zod schema to a FieldKind, collecting nested definitions.
 * Unsupported schemas add a reason and return undefined.
 */
function fieldKindOf(
  schema: z.ZodTypeAny,
  where: string,
  dependencies: TypeDefinition[],
  reasons: string[]
): FieldKind | undefined {
  const nested = definitions.get(schema);
  if (nested) {
    if (!dependencies.includes(nested)) dependencies.push(nested);
    return { type: 'entity', entity: nested.descriptor.typeId };
  }
  if (bytesSchemas.has(schema)) return { type: 'scalar', scalar: 'bytes' };
  if (schema instanceof z.ZodBranded) return fieldKindOf(schema.unwrap(), where, dependencies, reasons);
  if (schema instanceof z.ZodString) {
    return { type: 'scalar', scalar: schema.isUUID ? 'uuid' : 'string' };
  }
  if (schema instanceof z.ZodNumber) {
    return { type: 'scalar', scalar: schema.isInt ? 'integer' : 'number' };
  }
  if (schema instanceof z.ZodBoolean) return { type: 'scalar', scalar: 'boolean' };
  if (schema instanceof z.ZodDate) return { type: 'scalar', scalar: 'timestamp' };
  if (schema instanceof z.ZodArray) {
    const items = fieldKindOf(schema.element, `${where}[]`, dependencies, reasons);
    return items ? { type: 'list', items } : undefined;
  }
  if (schema instanceof z.ZodRecord) {
    if (!(schema.keySchema instanceof z.ZodString)) {
      reasons.push(`${where}: record keys must be strings`);
      return undefined;
    }
    const values = fieldKindOf(schema.valueSchema, `${where}{}`, dependencies, reasons);
    return values ? { type: 'record', values } : undefined;
  }
  if (schema instanceof z.ZodObject) {
    reasons.push(`${where}: nested objects must be declared with defineEmbeddable`);
    return undefined;
  }
  if (schema instanceof z.ZodOptional) {
    reasons.push(`${where}: only fields can be optional, not list items or record values`);
    return undefined;
  }
  reasons.push(`${where}: unsupported schema ${schemaName(schema)}`);
  return undefined;
}

function identityCodecOf(schema: z.ZodTypeAny): IdentityCodecName | undefined {
  if (schema instanceof z.ZodBranded) return identityCodecOf(schema.unwrap());
  if (schema instanceof z.ZodString) return schema.isUUID ? 'uuid' : 'string';
  if (schema instanceof z.ZodNumber && schema.isInt) return 'integer';
  return undefined;
}

function describeFields(
  shape: z.ZodRawShape,
  keys: Record<string, string>,
  skip: string | undefined,
  dependencies: TypeDefinition[],
  reasons: string[]
): FieldDescriptor[] {
  for (const name of Object.keys(keys)) {
    if (!(name in shape)) {
      reasons.push(`keys.${name}: no such field`);
    } else if (name === skip) {
      reasons.push(`keys.${name}: the identity is the map key and has no document key`);
    }
  }

  const fields: FieldDescriptor[] = [];
  for (const [name, schema] of Object.entries(shape)) {
    if (name === skip) continue;
    const optional = schema instanceof z.ZodOptional;
    const inner: z.ZodTypeAny = schema instanceof z.ZodOptional ? schema.unwrap() : schema;
    const kind = fieldKindOf(inner, name, dependencies, reasons);
    if (kind) {
      fields.push({ name, key: Object.hasOwn(keys, name) ? keys[name] : name, kind, optional });
    }
  }
  return fields;
}

function checkDescriptor(typeId: string, descriptor: TypeDescriptor, reasons: string[]): void {
  const result = validateTypeDescriptor(descriptor);
  reasons.push(...result.errors.map((e) => `${e.path}: ${e.message}`));
  if (reasons.length > 0) {
    throw new InvalidDescriptorError(typeId, reasons);
  }
}

/**
 * Declare an entity stored in a collection, keyed by identity.
 *
 * The identity codec follows the identity schema: `z.string().uuid()` is a
 * uuid key, `z.string()` a string key, `z.number().int()` an integer key.
 *
 * @example
 * ```typescript
 * const Contact = defineEntity({
 *   name: 'Contact',
 *   collection: 'contacts',
 *   identity: 'id',
 *   fields: {
 *     id: z.string().uuid(),
 *     name: z.string(),
 *     email: z.string().optional(),
 *   },
 * });
 * ```
 *
 * @throws InvalidDescriptorError when the shape uses unsupported schemas
 */
export function defineEntity<S extends z.ZodRawShape, K extends keyof S & string>(
  config: EntityConfig<S, K>
): EntityType<ShapeOutput<S>, K> {
  const reasons: string[] = [];
  const dependencies: TypeDefinition[] = [];

  const identitySchema: z.ZodTypeAny = config.fields[config.identity];
  const codec = identityCodecOf(identitySchema);
  if (!codec) {
    reasons.push(
      `${config.identity}: identity must be z.string(), z.string().uuid() or z.number().int(), found ${schemaName(identitySchema)}`
    );
  }

  const collection =
    config.collection === undefined
      ? [toSnakeCase(config.name)]
      : typeof config.collection === 'string'
        ? [config.collection]
        : [...config.collection];

  const descriptor: EntityDescriptor = {
    kind: 'entity',
    typeId: config.name,
    collection,
    identity: { field: config.identity, codec: codec ?? 'string' },
    fields: describeFields(config.fields, config.keys ?? {}, config.identity, dependencies, reasons),
  };
  checkDescriptor(config.name, descriptor, reasons);

  const schema = z.object(config.fields);
  const type: EntityType<ShapeOutput<S>, K> = {
    descriptor,
    dependencies,
    identity: config.identity,
    schema,
    parse: (value) => schema.parse(value),
  };
  definitions.set(schema, type);
  return type;
}

/**
 * Declare a value type embedded by nested fields of other types.
 *
 * @example
 * ```typescript
 * const Address = defineEmbeddable({
 *   name: 'Address',
 *   fields: { street: z.string(), city: z.string() },
 * });
 *
 * const Contact = defineEntity({
 *   name: 'Contact',
 *   identity: 'id',
 *   fields: { id: z.string().uuid(), address: Address.schema.optional() },
 * });
 * ```
 *
 * @throws InvalidDescriptorError when the shape uses unsupported schemas
 */
export function defineEmbeddable<S extends z.ZodRawShape>(
  config: EmbeddableConfig<S>
): EmbeddableType<ShapeOutput<S>> {
  const reasons: string[] = [];
  const dependencies: TypeDefinition[] = [];

  const descriptor: EmbeddableDescriptor = {
    kind: 'embeddable',
    typeId: config.name,
    fields: describeFields(config.fields, config.keys ?? {}, undefined, dependencies, reasons),
  };
  checkDescriptor(config.name, descriptor, reasons);

  const schema = z.object(config.fields);
  const type: EmbeddableType<ShapeOutput<S>> = {
    descriptor,
    dependencies,
    schema,
    parse: (value) => schema.parse(value),
  };
  definitions.set(schema, type);
  return type;
}

export function isTypeDefinition(value: TypeDefinition | TypeDescriptor): value is TypeDefinition {
  return 'descriptor' in value;
}
