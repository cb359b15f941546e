// Identity codecs - identity values to and from collection map keys

import { z } from 'zod';
import type { IdentityCodecName, IdentityValue } from '@docmap/protocol';
import { InvalidIdentityError } from '../errors.js';

const uuidSchema = z.string().uuid();
const stringKeySchema = z.string().min(1);
const integerSchema = z.number().int().safe();
const integerKeyPattern = /^-?(0|[1-9][0-9]*)$/;

/**
 * Render an identity value as a map key.
 *
 * - uuid: the lowercase 8-4-4-4-12 hex form
 * - string: any non-empty string, unchanged
 * - integer: a safe integer in decimal
 *
 * @throws InvalidIdentityError if the value does not fit the codec
 */
export function encodeIdentity(codec: IdentityCodecName, value: unknown): string {
  switch (codec) {
    case 'uuid': {
      const parsed = uuidSchema.safeParse(value);
      if (!parsed.success) throw new InvalidIdentityError(value, 'expected a uuid');
      return parsed.data.toLowerCase();
    }
    case 'string': {
      const parsed = stringKeySchema.safeParse(value);
      if (!parsed.success) throw new InvalidIdentityError(value, 'expected a non-empty string');
      return parsed.data;
    }
    case 'integer': {
      const parsed = integerSchema.safeParse(value);
      if (!parsed.success) throw new InvalidIdentityError(value, 'expected a safe integer');
      return String(parsed.data);
    }
  }
}

/**
 * Read an identity value back from a map key.
 *
 * String and uuid keys come back exactly as stored, so a uuid key written
 * in uppercase by another peer keeps its case.
 *
 * @throws InvalidIdentityError if the key does not fit the codec
 */
export function decodeIdentity(codec: IdentityCodecName, key: string): IdentityValue {
  switch (codec) {
    case 'uuid':
      if (!uuidSchema.safeParse(key).success) {
        throw new InvalidIdentityError(key, 'expected a uuid');
      }
      return key;
    case 'string':
      if (!stringKeySchema.safeParse(key).success) {
        throw new InvalidIdentityError(key, 'expected a non-empty string');
      }
      return key;
    case 'integer': {
      if (!integerKeyPattern.test(key)) {
        throw new InvalidIdentityError(key, 'expected a decimal integer key');
      }
      const value = Number(key);
      if (!Number.isSafeInteger(value)) {
        throw new InvalidIdentityError(key, 'expected a safe integer');
      }
      return value;
    }
  }
}

/**
 * Whether two map keys name the same identity. Uuid keys compare without
 * regard to case.
 */
export function sameIdentityKey(codec: IdentityCodecName, a: string, b: string): boolean {
  return codec === 'uuid' ? a.toLowerCase() === b.toLowerCase() : a === b;
}
