import Database from 'better-sqlite3';
import type { DiskCacheTier } from '@layered-http/core';

export interface SQLiteCacheStoreOptions {
  /**
   * File path, `':memory:'`, or an open `better-sqlite3` connection.
   * Defaults to `':memory:'`. A connection passed in is left open by
   * `close()`.
   */
  database?: string | Database.Database;
}

interface ValueRow {
  value: Buffer;
}

interface CountRow {
  total: number;
}

/**
 * Disk tier of the response cache backed by a SQLite table. better-sqlite3
 * is synchronous, which keeps cache reads synchronous end to end.
 */
export class SQLiteCacheStore implements DiskCacheTier {
  private readonly db: Database.Database;
  private readonly ownsConnection: boolean;
  private closed = false;

  private readonly selectStatement: Database.Statement<[string], ValueRow>;
  private readonly upsertStatement: Database.Statement<[string, Buffer, number]>;
  private readonly deleteStatement: Database.Statement<[string]>;
  private readonly clearStatement: Database.Statement<[]>;
  private readonly countStatement: Database.Statement<[], CountRow>;

  constructor(options: SQLiteCacheStoreOptions = {}) {
    const database = options.database ?? ':memory:';
    if (typeof database === 'string') {
      this.db = new Database(database);
      this.ownsConnection = true;
    } else {
      this.db = database;
      this.ownsConnection = false;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        value BLOB NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);

    this.selectStatement = this.db.prepare(
      'SELECT value FROM cache_entries WHERE key = ?',
    );
    this.upsertStatement = this.db.prepare(`
      INSERT INTO cache_entries (key, value, created_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        created_at = excluded.created_at
    `);
    this.deleteStatement = this.db.prepare(
      'DELETE FROM cache_entries WHERE key = ?',
    );
    this.clearStatement = this.db.prepare('DELETE FROM cache_entries');
    this.countStatement = this.db.prepare(
      'SELECT COUNT(*) AS total FROM cache_entries',
    );
  }

  get(key: string): Uint8Array | undefined {
    const row = this.selectStatement.get(key);
    if (!row) return undefined;

    return new Uint8Array(
      row.value.buffer,
      row.value.byteOffset,
      row.value.byteLength,
    );
  }

  set(key: string, value: Uint8Array): void {
    this.upsertStatement.run(key, Buffer.from(value), Date.now());
  }

  delete(key: string): void {
    this.deleteStatement.run(key);
  }

  clear(): void {
    this.clearStatement.run();
  }

  getStats(): { totalItems: number; databaseSizeKB: number } {
    const row = this.countStatement.get();

    const pageCount = this.db.pragma('page_count', { simple: true });
    const pageSize = this.db.pragma('page_size', { simple: true });
    const databaseSizeKB =
      typeof pageCount === 'number' && typeof pageSize === 'number'
        ? Math.round((pageCount * pageSize) / 1024)
        : 0;

    return { totalItems: row?.total ?? 0, databaseSizeKB };
  }

  /** Close the connection if this store opened it. Safe to call twice. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsConnection) {
      this.db.close();
    }
  }
}
