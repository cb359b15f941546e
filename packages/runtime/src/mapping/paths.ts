// Path resolution for collections and entities

import type { EntityDescriptor, Path } from '@docmap/protocol';
import { encodeIdentity } from './identity.js';

/**
 * Path of the map holding every instance of a type, e.g. ['contacts'].
 */
export function collectionPath(descriptor: EntityDescriptor): Path {
  return [...descriptor.collection];
}

/**
 * Path of one instance: the collection path plus the encoded identity.
 *
 * @throws InvalidIdentityError if the identity cannot be rendered as a map key
 */
export function entityPath(descriptor: EntityDescriptor, identity: unknown): Path {
  return [...descriptor.collection, encodeIdentity(descriptor.identity.codec, identity)];
}
