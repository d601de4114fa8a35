/**
 * Storage module exports.
 */

export type { Storage, Flushable } from './storage.js';
export { isFlushable } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { DeferredStorageConfig } from './deferred-storage.js';
export { DeferredStorage, createDeferredStorage } from './deferred-storage.js';
export type { JsonMemoryStoreConfig } from './json-memory-store.js';
export { JsonMemoryStore, formatExchange } from './json-memory-store.js';
export { JsonPersonaStore, PERSONA_STATE_VERSION } from './json-persona-store.js';
