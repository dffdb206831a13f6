import fs from 'fs';
import path from 'path';
import { hashKey, type DiskCacheTier } from '@layered-http/core';

export interface FileCacheStoreOptions {
  /** Directory holding one file per entry. Created on first write. */
  directory: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Disk tier of the response cache that writes each entry to its own file.
 * File names are the sha256 of the cache key.
 */
export class FileCacheStore implements DiskCacheTier {
  readonly directory: string;

  constructor(options: FileCacheStoreOptions) {
    this.directory = path.resolve(options.directory);
  }

  get(key: string): Uint8Array | undefined {
    let contents: Buffer;
    try {
      contents = fs.readFileSync(this.fileFor(key));
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
    return new Uint8Array(
      contents.buffer,
      contents.byteOffset,
      contents.byteLength,
    );
  }

  set(key: string, value: Uint8Array): void {
    fs.mkdirSync(this.directory, { recursive: true });

    // Write then rename so a reader never sees a partial file
    const file = this.fileFor(key);
    const temp = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(temp, value);
    fs.renameSync(temp, file);
  }

  delete(key: string): void {
    fs.rmSync(this.fileFor(key), { force: true });
  }

  clear(): void {
    for (const name of this.listFiles()) {
      fs.rmSync(path.join(this.directory, name), { force: true });
    }
  }

  getStats(): { totalItems: number; totalBytes: number } {
    let totalBytes = 0;
    const files = this.listFiles();
    for (const name of files) {
      totalBytes += fs.statSync(path.join(this.directory, name)).size;
    }
    return { totalItems: files.length, totalBytes };
  }

  private fileFor(key: string): string {
    return path.join(this.directory, hashKey(key));
  }

  private listFiles(): Array<string> {
    try {
      return fs.readdirSync(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}
