/**
 * Tier 1 of the response cache. Holds decoded objects as-is.
 *
 * All methods are synchronous so a cache lookup never yields to the event
 * loop between the check and the use of its result.
 */
export interface MemoryCacheTier {
  get(key: string): unknown | undefined;
  set(key: string, value: unknown): void;
  delete(key: string): void;
  clear(): void;
  /** Release timers or other resources held by the tier. */
  destroy?(): void;
}

/**
 * Tier 2 of the response cache. Holds encoded bytes that survive the
 * process.
 *
 * Implementations may throw on I/O failure; the tiered cache treats a
 * throwing read as a miss.
 */
export interface DiskCacheTier {
  get(key: string): Uint8Array | undefined;
  set(key: string, value: Uint8Array): void;
  delete(key: string): void;
  clear(): void;
  close?(): void;
}

export interface CacheTiers {
  memory?: MemoryCacheTier;
  disk?: DiskCacheTier;
}
