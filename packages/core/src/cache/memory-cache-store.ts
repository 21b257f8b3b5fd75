/**
 * In-process cache store
 *
 * Holds file contents in memory, so it suits tests and short-lived servers
 * with small build outputs.
 */

import { CacheError, type CacheEntry, type DirectorySnapshot } from '@pipewright/shared';
import { createMemorySnapshot, readContent, type SnapshotContent } from './snapshot.js';
import type { CacheStore } from './types.js';

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, snapshot: DirectorySnapshot): Promise<void> {
    const contents: SnapshotContent[] = [];
    for (const file of snapshot.files) {
      contents.push({ path: file.path, mode: file.mode, content: await readContent(snapshot.openFile(file.path)) });
    }

    const stored = createMemorySnapshot(contents);
    if (stored.digest !== snapshot.digest) {
      throw new CacheError(key, `Contents for cache entry '${key}' changed while being stored`);
    }
    this.entries.set(key, { key, snapshot: stored, savedAt: new Date() });
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
