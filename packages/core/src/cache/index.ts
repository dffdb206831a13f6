export { TieredCacheStore } from './tiered-cache-store.js';
export type { CacheHit, CacheTierName } from './tiered-cache-store.js';
export {
  jsonCodec,
  dataCodec,
  createImageCodec,
  createResponseCodecs,
} from './codecs.js';
export type { ResponseCodec, ResponseCodecs } from './codecs.js';
