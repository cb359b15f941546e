// Tests for mapping error types

import { describe, it, expect } from 'vitest';
import {
  InvalidDescriptorError,
  InvalidIdentityError,
  MappingError,
  NodeNotFoundError,
  TransactionAbortedError,
  isMappingError,
} from './errors.js';

describe('MappingError', () => {
  it('carries a code and narrows with isMappingError', () => {
    const error = new NodeNotFoundError(['contacts', 'c-1']);

    expect(error).toBeInstanceOf(MappingError);
    expect(error.code).toBe('NODE_NOT_FOUND');
    expect(error.name).toBe('NodeNotFoundError');
    expect(error.message).toBe('Node not found: contacts.c-1');
    expect(isMappingError(error)).toBe(true);
    expect(isMappingError(new Error('plain'))).toBe(false);
  });

  it('formats list indexes in paths', () => {
    expect(new NodeNotFoundError(['contacts', 'c-1', 'tags', 2]).message).toBe('Node not found: contacts.c-1.tags[2]');
  });

  it('joins descriptor reasons', () => {
    const error = new InvalidDescriptorError('Contact', ['a: bad', 'b: worse']);

    expect(error.message).toBe('Invalid descriptor for "Contact": a: bad; b: worse');
    expect(error.reasons).toEqual(['a: bad', 'b: worse']);
  });

  it('quotes string identities only', () => {
    expect(new InvalidIdentityError('c-1', 'expected a uuid').message).toBe('Invalid identity "c-1": expected a uuid');
    expect(new InvalidIdentityError(1.5, 'expected a safe integer').message).toBe(
      'Invalid identity 1.5: expected a safe integer'
    );
  });

  it('keeps the cause of an aborted transaction', () => {
    const cause = new Error('boom');
    const error = new TransactionAbortedError(cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Transaction aborted: boom');
  });
});
