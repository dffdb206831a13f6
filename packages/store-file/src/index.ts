export { FileCacheStore } from './file-cache-store.js';
export type { FileCacheStoreOptions } from './file-cache-store.js';

// Re-export the tier interface from the core package for convenience
export type { DiskCacheTier } from '@layered-http/core';
