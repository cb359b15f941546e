// @docmap/documents
// Addressable document contract and its implementations.
//
// The mapping runtime codes against the Document interface only; the
// implementations here (in-memory, Yjs, staged) fulfill it for different
// stores.

export * from './interfaces/index.js';
export * from './errors.js';
export * from './in-memory/index.js';
export * from './yjs/index.js';
export * from './staged/index.js';
