import type { Logger } from 'pino';
import type { CacheTiers } from '../stores/cache-tier.js';
import type { CachingPolicy, ResponseType } from '../types/request.js';
import type { ResponseCodec } from './codecs.js';

const RESPONSE_TYPES: ReadonlyArray<ResponseType> = ['json', 'image', 'data'];

export type CacheTierName = 'memory' | 'disk';

export interface CacheHit<T> {
  value: T;
  tier: CacheTierName;
}

/**
 * Two-tier response cache: memory first, then disk.
 *
 * Entries are keyed by response type and cache name together, so the same
 * name used for a JSON document and an image never collides. Tier failures
 * are logged and treated as misses; they never fail a request.
 */
export class TieredCacheStore {
  constructor(
    private readonly tiers: CacheTiers,
    private readonly logger: Logger,
  ) {}

  static effectiveKey(cacheName: string, responseType: ResponseType): string {
    return `${responseType}:${cacheName}`;
  }

  get<T>(
    cacheName: string,
    codec: ResponseCodec<T>,
    policy: CachingPolicy = 'memoryAndFile',
  ): T | undefined {
    return this.lookup(cacheName, codec, policy)?.value;
  }

  /**
   * Same as `get`, reporting which tier answered. Only `memoryAndFile`
   * consults the disk tier; a disk hit is copied into memory so the next
   * read is a memory hit.
   */
  lookup<T>(
    cacheName: string,
    codec: ResponseCodec<T>,
    policy: CachingPolicy = 'memoryAndFile',
  ): CacheHit<T> | undefined {
    if (policy === 'none') return undefined;
    const key = TieredCacheStore.effectiveKey(cacheName, codec.responseType);

    const inMemory = this.readMemory(key);
    if (inMemory !== undefined && codec.is(inMemory)) {
      return { value: inMemory, tier: 'memory' };
    }

    const disk = this.tiers.disk;
    if (policy !== 'memoryAndFile' || !disk) return undefined;

    let bytes: Uint8Array | undefined;
    try {
      bytes = disk.get(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'disk cache read failed');
      return undefined;
    }
    if (bytes === undefined) return undefined;

    let value: T;
    try {
      value = codec.decode(bytes);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'dropping corrupt disk cache entry');
      this.deleteFromDisk(key);
      return undefined;
    }

    this.writeMemory(key, value);
    return { value, tier: 'disk' };
  }

  put<T>(
    cacheName: string,
    value: T,
    codec: ResponseCodec<T>,
    policy: CachingPolicy,
  ): void {
    if (policy === 'none') return;

    const key = TieredCacheStore.effectiveKey(cacheName, codec.responseType);
    this.writeMemory(key, value);

    if (policy !== 'memoryAndFile' || !this.tiers.disk) return;
    try {
      this.tiers.disk.set(key, codec.encode(value));
    } catch (error) {
      this.logger.warn({ err: error, key }, 'disk cache write failed');
    }
  }

  /**
   * Remove `cacheName` from both tiers, for one response type or for all
   * of them.
   */
  invalidate(cacheName: string, responseType?: ResponseType): void {
    const types = responseType ? [responseType] : RESPONSE_TYPES;
    for (const type of types) {
      const key = TieredCacheStore.effectiveKey(cacheName, type);
      try {
        this.tiers.memory?.delete(key);
      } catch (error) {
        this.logger.warn({ err: error, key }, 'memory cache delete failed');
      }
      this.deleteFromDisk(key);
    }
  }

  clear(): void {
    try {
      this.tiers.memory?.clear();
    } catch (error) {
      this.logger.warn({ err: error }, 'memory cache clear failed');
    }
    try {
      this.tiers.disk?.clear();
    } catch (error) {
      this.logger.warn({ err: error }, 'disk cache clear failed');
    }
  }

  /** Release both tiers. The store must not be used afterwards. */
  close(): void {
    try {
      this.tiers.memory?.destroy?.();
    } catch (error) {
      this.logger.warn({ err: error }, 'memory cache destroy failed');
    }
    try {
      this.tiers.disk?.close?.();
    } catch (error) {
      this.logger.warn({ err: error }, 'disk cache close failed');
    }
  }

  private readMemory(key: string): unknown {
    try {
      return this.tiers.memory?.get(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'memory cache read failed');
      return undefined;
    }
  }

  private writeMemory(key: string, value: unknown): void {
    try {
      this.tiers.memory?.set(key, value);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'memory cache write failed');
    }
  }

  private deleteFromDisk(key: string): void {
    try {
      this.tiers.disk?.delete(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'disk cache delete failed');
    }
  }
}
