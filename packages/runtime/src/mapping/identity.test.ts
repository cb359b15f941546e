// Tests for identity codecs and path resolution

import { describe, it, expect } from 'vitest';
import type { EntityDescriptor } from '@docmap/protocol';
import { decodeIdentity, encodeIdentity, sameIdentityKey } from './identity.js';
import { collectionPath, entityPath } from './paths.js';
import { InvalidIdentityError } from '../errors.js';

const U1 = '0b7e3c52-5d0f-4a51-9c64-2f4b7a3d9e10';

describe('encodeIdentity', () => {
  it('lowercases uuids', () => {
    expect(encodeIdentity('uuid', U1.toUpperCase())).toBe(U1);
  });

  it('rejects malformed uuids', () => {
    expect(() => encodeIdentity('uuid', 'not-a-uuid')).toThrow(InvalidIdentityError);
    expect(() => encodeIdentity('uuid', 42)).toThrow(InvalidIdentityError);
  });

  it('keeps strings unchanged', () => {
    expect(encodeIdentity('string', 'Ringo Starr')).toBe('Ringo Starr');
  });

  it('rejects empty strings', () => {
    expect(() => encodeIdentity('string', '')).toThrow('Invalid identity "": expected a non-empty string');
  });

  it('renders integers in decimal', () => {
    expect(encodeIdentity('integer', 42)).toBe('42');
    expect(encodeIdentity('integer', -7)).toBe('-7');
  });

  it('rejects non-integers', () => {
    expect(() => encodeIdentity('integer', 1.5)).toThrow(InvalidIdentityError);
    expect(() => encodeIdentity('integer', '42')).toThrow(InvalidIdentityError);
    expect(() => encodeIdentity('integer', Number.MAX_SAFE_INTEGER + 1)).toThrow(InvalidIdentityError);
  });
});

describe('decodeIdentity', () => {
  it('reads integer keys as numbers', () => {
    expect(decodeIdentity('integer', '42')).toBe(42);
    expect(decodeIdentity('integer', '-7')).toBe(-7);
  });

  it('rejects integer keys with leading zeros or other text', () => {
    expect(() => decodeIdentity('integer', '042')).toThrow(InvalidIdentityError);
    expect(() => decodeIdentity('integer', '4e2')).toThrow(InvalidIdentityError);
  });

  it('keeps uuid and string keys as stored', () => {
    expect(decodeIdentity('uuid', U1.toUpperCase())).toBe(U1.toUpperCase());
    expect(decodeIdentity('string', 'Ringo Starr')).toBe('Ringo Starr');
  });

  it('rejects keys the codec would never write', () => {
    expect(() => decodeIdentity('uuid', 'c-1')).toThrow('Invalid identity "c-1": expected a uuid');
    expect(() => decodeIdentity('string', '')).toThrow(InvalidIdentityError);
  });
});

describe('sameIdentityKey', () => {
  it('compares uuid keys without regard to case', () => {
    expect(sameIdentityKey('uuid', U1.toUpperCase(), U1)).toBe(true);
    expect(sameIdentityKey('string', 'Ringo', 'ringo')).toBe(false);
    expect(sameIdentityKey('integer', '42', '42')).toBe(true);
  });
});

describe('paths', () => {
  const contact: EntityDescriptor = {
    kind: 'entity',
    typeId: 'Contact',
    collection: ['crm', 'contacts'],
    identity: { field: 'id', codec: 'uuid' },
    fields: [],
  };

  it('resolves the collection path', () => {
    expect(collectionPath(contact)).toEqual(['crm', 'contacts']);
  });

  it('appends the encoded identity for an entity', () => {
    expect(entityPath(contact, U1.toUpperCase())).toEqual(['crm', 'contacts', U1]);
  });

  it('returns a fresh path each time', () => {
    const path = collectionPath(contact);

    expect(path).not.toBe(contact.collection);
  });

  it('rejects identities the codec cannot render', () => {
    expect(() => entityPath(contact, 'c-1')).toThrow('Invalid identity "c-1": expected a uuid');
  });
});
