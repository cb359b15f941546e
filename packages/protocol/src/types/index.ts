// Re-export all protocol types

export * from './document.js';
export * from './descriptors.js';
