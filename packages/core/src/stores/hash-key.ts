import { createHash } from 'crypto';

/**
 * Hash a cache key into a fixed-length, filesystem-safe hex string.
 */
export function hashKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}
