// @docmap/protocol
// Data-only types shared by documents and the mapping runtime

export * from './types/index.js';
export * from './validation/index.js';
