// Types
export * from './types.js';

// Executor framework
export * from './executor/index.js';

// Document access
export { LocalDocumentStore } from './documents/local-store.js';
