// Mapping between document subtrees and instances

export { hydrate } from './hydrate.js';
export { reconcile } from './reconcile.js';
export { collectionPath, entityPath } from './paths.js';
export { encodeIdentity, decodeIdentity, sameIdentityKey } from './identity.js';
export { encodeScalar, decodeScalar, describeValue } from './scalars.js';
