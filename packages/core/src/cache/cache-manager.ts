/**
 * Cache Manager
 * Restores and saves the build-output directory under an exact key.
 * Store failures are logged and reported on the outcome, never thrown.
 */

import { mkdir, rm } from 'node:fs/promises';
import {
  createChildLogger,
  type CacheEntry,
  type CacheRestoreOutcome,
  type CacheSaveOutcome,
  type Logger,
} from '@pipewright/shared';
import { applySnapshot, captureSnapshot } from './snapshot.js';
import type { CacheStore } from './types.js';

export interface CacheManagerOptions {
  store: CacheStore;
  logger?: Logger;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CacheManager {
  private readonly store: CacheStore;
  private readonly logger: Logger;

  constructor(options: CacheManagerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createChildLogger({ component: 'CacheManager' });
  }

  /**
   * Populate `targetDir` from the entry stored under `key`.
   * On a miss the directory is created empty.
   */
  async restore(key: string, targetDir: string): Promise<CacheRestoreOutcome> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(key);
    } catch (error) {
      const message = describe(error);
      this.logger.warn({ key, error: message }, 'Cache restore failed, continuing without cache');
      await mkdir(targetDir, { recursive: true });
      return { key, hit: false, fileCount: 0, error: message };
    }

    if (!entry) {
      this.logger.info({ key }, 'Cache miss');
      await mkdir(targetDir, { recursive: true });
      return { key, hit: false, fileCount: 0 };
    }

    try {
      await applySnapshot(targetDir, entry.snapshot);
    } catch (error) {
      const message = describe(error);
      this.logger.warn({ key, error: message }, 'Cache restore failed, continuing without cache');
      await rm(targetDir, { recursive: true, force: true });
      await mkdir(targetDir, { recursive: true });
      return { key, hit: false, fileCount: 0, error: message };
    }

    this.logger.info(
      { key, files: entry.snapshot.files.length, sizeBytes: entry.snapshot.sizeBytes },
      'Cache hit'
    );
    return { key, hit: true, fileCount: entry.snapshot.files.length };
  }

  /**
   * Snapshot `sourceDir` and store it under `key`.
   * An entry with the same digest is left untouched; only its manifest is read.
   */
  async save(key: string, sourceDir: string): Promise<CacheSaveOutcome> {
    try {
      const snapshot = await captureSnapshot(sourceDir);
      const outcome = {
        key,
        fileCount: snapshot.files.length,
        sizeBytes: snapshot.sizeBytes,
      };

      const existing = await this.store.get(key).catch((error: unknown) => {
        this.logger.warn({ key, error: describe(error) }, 'Could not read existing cache entry');
        return undefined;
      });

      if (existing?.snapshot.digest === snapshot.digest) {
        this.logger.info({ key }, 'Cache entry unchanged');
        return { ...outcome, saved: false, unchanged: true };
      }

      await this.store.put(key, snapshot);
      this.logger.info(outcome, 'Cache saved');
      return { ...outcome, saved: true, unchanged: false };
    } catch (error) {
      const message = describe(error);
      this.logger.warn({ key, error: message }, 'Cache save failed');
      return { key, saved: false, unchanged: false, fileCount: 0, sizeBytes: 0, error: message };
    }
  }
}
