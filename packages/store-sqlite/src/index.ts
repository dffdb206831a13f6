export { SQLiteCacheStore } from './sqlite-cache-store.js';
export type { SQLiteCacheStoreOptions } from './sqlite-cache-store.js';

// Re-export the tier interface from the core package for convenience
export type { DiskCacheTier } from '@layered-http/core';
