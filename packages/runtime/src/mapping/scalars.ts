// Scalar codecs - field values to and from document scalars

import {
  describeKind,
  kindOfValue,
  type NodeValue,
  type Path,
  type ScalarFieldType,
  type ScalarValue,
} from '@docmap/protocol';
import { TypeMismatchError } from '../errors.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Label for an in-memory value in error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'bytes';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

/**
 * Convert an instance value to the scalar stored for a field.
 *
 * Timestamps are stored as epoch milliseconds, uuids in lowercase.
 *
 * @throws TypeMismatchError if the value is not of the field's type
 */
export function encodeScalar(type: ScalarFieldType, value: unknown, path: Path): ScalarValue {
  const mismatch = () => new TypeMismatchError(path, type, describeValue(value));

  switch (type) {
    case 'string':
      if (typeof value !== 'string') throw mismatch();
      return value;
    case 'number':
      if (typeof value !== 'number') throw mismatch();
      return value;
    case 'integer':
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) throw mismatch();
      return value;
    case 'boolean':
      if (typeof value !== 'boolean') throw mismatch();
      return value;
    case 'bytes':
      if (!(value instanceof Uint8Array)) throw mismatch();
      return value;
    case 'timestamp':
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) throw mismatch();
      return value.getTime();
    case 'uuid':
      if (typeof value !== 'string' || !UUID_PATTERN.test(value)) throw mismatch();
      return value.toLowerCase();
  }
}

/**
 * Convert a stored scalar to the instance value of a field.
 *
 * @throws TypeMismatchError if the node holds a different kind of scalar
 */
export function decodeScalar(type: ScalarFieldType, node: NodeValue, path: Path): unknown {
  const mismatch = () => new TypeMismatchError(path, type, describeKind(kindOfValue(node)));

  switch (type) {
    case 'string':
      if (typeof node !== 'string') throw mismatch();
      return node;
    case 'number':
      if (typeof node !== 'number') throw mismatch();
      return node;
    case 'integer':
      if (typeof node !== 'number' || !Number.isSafeInteger(node)) throw mismatch();
      return node;
    case 'boolean':
      if (typeof node !== 'boolean') throw mismatch();
      return node;
    case 'bytes':
      if (!(node instanceof Uint8Array)) throw mismatch();
      return node;
    case 'timestamp':
      if (typeof node !== 'number' || !Number.isFinite(node)) throw mismatch();
      return new Date(node);
    case 'uuid':
      if (typeof node !== 'string' || !UUID_PATTERN.test(node)) throw mismatch();
      return node.toLowerCase();
  }
}
