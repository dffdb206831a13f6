export type { MemoryCacheTier, DiskCacheTier, CacheTiers } from './cache-tier.js';
export { hashKey } from './hash-key.js';
