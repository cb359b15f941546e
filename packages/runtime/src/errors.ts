// Mapping error types

import { formatPath, type Path } from '@docmap/protocol';

export type MappingErrorCode =
  | 'UNREGISTERED_TYPE'
  | 'CONFLICTING_SCHEMA'
  | 'INVALID_IDENTITY'
  | 'NODE_NOT_FOUND'
  | 'SHAPE_MISMATCH'
  | 'MISSING_FIELD'
  | 'TYPE_MISMATCH'
  | 'INVALID_DESCRIPTOR'
  | 'ENTITY_ALREADY_EXISTS'
  | 'KEY_MISMATCH'
  | 'TRANSACTION_ABORTED'
  | 'REGISTRY_SEALED'
  | 'CONFIG_ERROR';

/**
 * Base class for all mapping errors.
 * Provides structured error information for debugging and logging.
 */
export class MappingError extends Error {
  readonly code: MappingErrorCode;

  constructor(code: MappingErrorCode, message: string) {
    super(message);
    this.name = 'MappingError';
    this.code = code;
  }
}

export function isMappingError(value: unknown): value is MappingError {
  return value instanceof MappingError;
}

/**
 * Error when a type id is used before its descriptor was registered.
 */
export class UnregisteredTypeError extends MappingError {
  readonly typeId: string;

  constructor(typeId: string) {
    super('UNREGISTERED_TYPE', `Type not registered: ${typeId}`);
    this.name = 'UnregisteredTypeError';
    this.typeId = typeId;
  }
}

/**
 * Error when a type id is registered again with a different shape.
 */
export class ConflictingSchemaError extends MappingError {
  readonly typeId: string;

  constructor(typeId: string) {
    super('CONFLICTING_SCHEMA', `Type "${typeId}" is already registered with a different schema`);
    this.name = 'ConflictingSchemaError';
    this.typeId = typeId;
  }
}

/**
 * Error when an identity value cannot be rendered as (or read from) a map key.
 */
export class InvalidIdentityError extends MappingError {
  readonly identity: unknown;

  constructor(identity: unknown, reason: string) {
    const shown = typeof identity === 'string' ? `"${identity}"` : String(identity);
    super('INVALID_IDENTITY', `Invalid identity ${shown}: ${reason}`);
    this.name = 'InvalidIdentityError';
    this.identity = identity;
  }
}

/**
 * Error when no node exists at a path expected to hold one.
 */
export class NodeNotFoundError extends MappingError {
  readonly path: Path;

  constructor(path: Path) {
    super('NODE_NOT_FOUND', `Node not found: ${formatPath(path)}`);
    this.name = 'NodeNotFoundError';
    this.path = path;
  }
}

/**
 * Error when a node has the wrong structure (e.g. a scalar where a map is
 * expected), or when the document rejects a write because of structure.
 */
export class ShapeMismatchError extends MappingError {
  readonly path: Path;
  readonly expected: string;
  readonly actual: string;
  readonly cause?: unknown;

  constructor(path: Path, expected: string, actual: string, cause?: unknown) {
    super('SHAPE_MISMATCH', `Expected ${expected} at ${formatPath(path)}, found ${actual}`);
    this.name = 'ShapeMismatchError';
    this.path = path;
    this.expected = expected;
    this.actual = actual;
    this.cause = cause;
  }
}

/**
 * Error when a required field is absent, in the document or on an instance.
 */
export class MissingFieldError extends MappingError {
  readonly typeId: string;
  readonly field: string;
  readonly path: Path;

  constructor(typeId: string, field: string, path: Path) {
    super('MISSING_FIELD', `Missing required field "${field}" of ${typeId} at ${formatPath(path)}`);
    this.name = 'MissingFieldError';
    this.typeId = typeId;
    this.field = field;
    this.path = path;
  }
}

/**
 * Error when a value is present but of the wrong type.
 */
export class TypeMismatchError extends MappingError {
  readonly path: Path;
  readonly expected: string;
  readonly actual: string;

  constructor(path: Path, expected: string, actual: string) {
    super('TYPE_MISMATCH', `Expected ${expected} at ${formatPath(path)}, found ${actual}`);
    this.name = 'TypeMismatchError';
    this.path = path;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Validation error for malformed descriptors or schema definitions.
 */
export class InvalidDescriptorError extends MappingError {
  readonly typeId: string;
  readonly reasons: string[];

  constructor(typeId: string, reasons: string[]) {
    super('INVALID_DESCRIPTOR', `Invalid descriptor for "${typeId}": ${reasons.join('; ')}`);
    this.name = 'InvalidDescriptorError';
    this.typeId = typeId;
    this.reasons = reasons;
  }
}

/**
 * Error when inserting an entity whose identity is already taken.
 */
export class EntityAlreadyExistsError extends MappingError {
  readonly typeId: string;
  readonly key: string;

  constructor(typeId: string, key: string) {
    super('ENTITY_ALREADY_EXISTS', `${typeId} "${key}" already exists`);
    this.name = 'EntityAlreadyExistsError';
    this.typeId = typeId;
    this.key = key;
  }
}

/**
 * Error when a created instance does not carry the identity it was created for.
 */
export class KeyMismatchError extends MappingError {
  readonly expected: string;
  readonly actual: string;

  constructor(typeId: string, expected: string, actual: string) {
    super('KEY_MISMATCH', `${typeId} created for "${expected}" has identity "${actual}"`);
    this.name = 'KeyMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error when a transaction callback throws. Staged writes were discarded.
 */
export class TransactionAbortedError extends MappingError {
  readonly cause: unknown;

  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TRANSACTION_ABORTED', `Transaction aborted: ${reason}`);
    this.name = 'TransactionAbortedError';
    this.cause = cause;
  }
}

/**
 * Error when registering a new shape into a sealed registry.
 */
export class RegistrySealedError extends MappingError {
  readonly typeId: string;

  constructor(typeId: string) {
    super('REGISTRY_SEALED', `Registry is sealed; cannot register "${typeId}"`);
    this.name = 'RegistrySealedError';
    this.typeId = typeId;
  }
}

/**
 * Error when configuration values are invalid.
 */
export class ConfigError extends MappingError {
  readonly variable: string;

  constructor(variable: string, reason: string) {
    super('CONFIG_ERROR', `Invalid ${variable}: ${reason}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}
