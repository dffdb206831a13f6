import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteCacheStore } from './sqlite-cache-store.js';

describe('SQLiteCacheStore', () => {
  let store: SQLiteCacheStore;

  beforeEach(() => {
    store = new SQLiteCacheStore();
  });

  afterEach(() => {
    if (store) {
      store.close();
    }
  });

  describe('basic operations', () => {
    it('should set and get bytes', () => {
      store.set('key1', new Uint8Array([1, 2, 3]));
      expect(Array.from(store.get('key1') ?? [])).toEqual([1, 2, 3]);
    });

    it('should return undefined for non-existent keys', () => {
      expect(store.get('non-existent')).toBeUndefined();
    });

    it('should overwrite existing values', () => {
      store.set('key1', new Uint8Array([1]));
      store.set('key1', new Uint8Array([9, 9]));
      expect(Array.from(store.get('key1') ?? [])).toEqual([9, 9]);
      expect(store.getStats().totalItems).toBe(1);
    });

    it('should delete values', () => {
      store.set('key1', new Uint8Array([1]));
      store.delete('key1');
      expect(store.get('key1')).toBeUndefined();
    });

    it('should handle deletion of non-existent keys', () => {
      expect(() => store.delete('non-existent')).not.toThrow();
    });

    it('should clear all values', () => {
      store.set('key1', new Uint8Array([1]));
      store.set('key2', new Uint8Array([2]));
      store.clear();

      expect(store.get('key1')).toBeUndefined();
      expect(store.get('key2')).toBeUndefined();
    });

    it('should store an empty payload', () => {
      store.set('empty', new Uint8Array(0));
      expect(store.get('empty')?.byteLength).toBe(0);
    });
  });

  describe('persistence', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlite-cache-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should persist data across instances', () => {
      const dbPath = path.join(directory, 'cache.db');
      const first = new SQLiteCacheStore({ database: dbPath });
      first.set('key1', new Uint8Array([5, 6]));
      first.close();

      const second = new SQLiteCacheStore({ database: dbPath });
      try {
        expect(Array.from(second.get('key1') ?? [])).toEqual([5, 6]);
      } finally {
        second.close();
      }
    });
  });

  describe('shared connections', () => {
    it('should leave a connection it did not open open on close', () => {
      const sqlite = new Database(':memory:');
      const sharedStore = new SQLiteCacheStore({ database: sqlite });

      try {
        sharedStore.set('key1', new Uint8Array([1]));
        sharedStore.close();

        expect(sqlite.open).toBe(true);
        const row = sqlite
          .prepare('SELECT COUNT(*) AS total FROM cache_entries')
          .get();
        expect(row).toEqual({ total: 1 });
      } finally {
        sqlite.close();
      }
    });

    it('should be safe to close twice', () => {
      store.close();
      expect(() => store.close()).not.toThrow();
    });
  });

  describe('statistics', () => {
    it('should report entry count and database size', () => {
      store.set('key1', new Uint8Array([1]));
      store.set('key2', new Uint8Array([2]));

      const stats = store.getStats();
      expect(stats.totalItems).toBe(2);
      expect(stats.databaseSizeKB).toBeGreaterThanOrEqual(0);
    });
  });
});
