export { InMemoryCacheStore } from './in-memory-cache-store.js';
export type { InMemoryCacheStoreOptions } from './in-memory-cache-store.js';

// Re-export the tier interface from the core package for convenience
export type { MemoryCacheTier } from '@layered-http/core';
