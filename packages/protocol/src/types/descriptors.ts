// Type descriptors - data-only schema for entities mapped onto a document

/**
 * Value types a scalar field can declare.
 *
 * `timestamp` is stored as epoch milliseconds and read back as a Date.
 * `uuid` is stored as its lowercase string form.
 */
export type ScalarFieldType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'bytes'
  | 'timestamp'
  | 'uuid';

/**
 * How a field is laid out in the document.
 *
 * - scalar: a leaf value
 * - entity: a nested map hydrated with another registered type (embedded by value)
 * - list: a list node whose items share one kind
 * - record: a map node keyed by string whose children share one kind
 */
export type FieldKind =
  | { type: 'scalar'; scalar: ScalarFieldType }
  | { type: 'entity'; entity: string }
  | { type: 'list'; items: FieldKind }
  | { type: 'record'; values: FieldKind };

export type FieldDescriptor = {
  /**
   * Property name on the in-memory instance
   */
  name: string;

  /**
   * Map key in the document node
   */
  key: string;

  kind: FieldKind;

  optional: boolean;
};

/**
 * How identity values are rendered as map keys
 */
export type IdentityCodecName = 'uuid' | 'string' | 'integer';

/**
 * Identity values as they appear on instances
 */
export type IdentityValue = string | number;

export type IdentityDescriptor = {
  /**
   * Property holding the identity on the instance
   */
  field: string;

  codec: IdentityCodecName;
};

/**
 * A type whose instances live in a collection, keyed by identity.
 */
export type EntityDescriptor = {
  kind: 'entity';

  /**
   * Unique type identifier, e.g. "Contact"
   */
  typeId: string;

  /**
   * Path of the collection map, e.g. ["contacts"]
   */
  collection: string[];

  identity: IdentityDescriptor;

  /**
   * Data fields in declaration order (the identity is not one of them)
   */
  fields: FieldDescriptor[];
};

/**
 * A value type embedded inside other types. It has no collection and no identity.
 */
export type EmbeddableDescriptor = {
  kind: 'embeddable';
  typeId: string;
  fields: FieldDescriptor[];
};

export type TypeDescriptor = EntityDescriptor | EmbeddableDescriptor;

/**
 * Untyped instance: property name to value
 */
export type EntityRecord = Record<string, unknown>;

export function isEntityDescriptor(descriptor: TypeDescriptor): descriptor is EntityDescriptor {
  return descriptor.kind === 'entity';
}

export function isEntityRecord(value: unknown): value is EntityRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Date)
  );
}
