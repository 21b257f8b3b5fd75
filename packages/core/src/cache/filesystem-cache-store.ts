/**
 * File system cache store
 *
 * Layout under the root directory:
 *   <encoded key>/entry.json   manifest (digest, size, file list with hashes)
 *   <encoded key>/files/...    file contents
 *
 * An entry is written into a temporary sibling directory and renamed into
 * place, so readers see either the previous entry or the new one. `get`
 * reads the manifest only; file contents are streamed when restored.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  CacheError,
  createChildLogger,
  type CacheEntry,
  type DirectorySnapshot,
} from '@pipewright/shared';
import {
  computeDigest,
  copySnapshotFile,
  createDirectorySnapshot,
  isMissing,
  resolveSnapshotPath,
} from './snapshot.js';
import type { CacheStore } from './types.js';

const MANIFEST_FILE = 'entry.json';
const FILES_DIR = 'files';
const MAX_SWAP_ATTEMPTS = 3;

const relativePathSchema = z
  .string()
  .min(1)
  .refine((path) => !path.startsWith('/') && !path.split('/').includes('..'), {
    message: 'path escapes the entry directory',
  });

const manifestSchema = z.object({
  key: z.string(),
  digest: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  savedAt: z.string().datetime(),
  files: z.array(
    z.object({
      path: relativePathSchema,
      mode: z.number().int().nonnegative(),
      size: z.number().int().nonnegative(),
      sha256: z.string().regex(/^[0-9a-f]{64}$/),
    })
  ),
});

type CacheManifest = z.infer<typeof manifestSchema>;

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export class FileSystemCacheStore implements CacheStore {
  private readonly root: string;
  private logger = createChildLogger({ component: 'FileSystemCacheStore' });

  constructor(root: string) {
    this.root = root;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entryDir = this.entryDir(key);

    let raw: string;
    try {
      raw = await readFile(join(entryDir, MANIFEST_FILE), 'utf-8');
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw new CacheError(key, `Failed to read cache entry '${key}': ${String(error)}`);
    }

    const parsed = manifestSchema.safeParse(this.parseJson(key, raw));
    if (!parsed.success) {
      throw new CacheError(key, `Cache entry '${key}' has a corrupt manifest`, {
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }

    const manifest = parsed.data;
    if (computeDigest(manifest.files) !== manifest.digest) {
      throw new CacheError(key, `Cache entry '${key}' does not match its digest`);
    }

    const snapshot = createDirectorySnapshot(join(entryDir, FILES_DIR), manifest.files);
    return { key, snapshot, savedAt: new Date(manifest.savedAt) };
  }

  async put(key: string, snapshot: DirectorySnapshot): Promise<void> {
    const encoded = encodeURIComponent(key);
    const tmpDir = join(this.root, `.tmp-${encoded}-${randomUUID()}`);

    try {
      await this.writeEntry(tmpDir, key, snapshot);
      await this.swapIntoPlace(tmpDir, this.entryDir(key), encoded);
    } catch (error) {
      await rm(tmpDir, { recursive: true, force: true });
      if (error instanceof CacheError) throw error;
      throw new CacheError(key, `Failed to write cache entry '${key}': ${String(error)}`);
    }

    this.logger.debug({ key, files: snapshot.files.length, sizeBytes: snapshot.sizeBytes }, 'Cache entry written');
  }

  private entryDir(key: string): string {
    return join(this.root, encodeURIComponent(key));
  }

  private parseJson(key: string, raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      throw new CacheError(key, `Cache entry '${key}' has a corrupt manifest`);
    }
  }

  private async writeEntry(dir: string, key: string, snapshot: DirectorySnapshot): Promise<void> {
    const filesDir = join(dir, FILES_DIR);
    await mkdir(filesDir, { recursive: true });

    for (const file of snapshot.files) {
      await copySnapshotFile(snapshot, file, resolveSnapshotPath(filesDir, file.path));
    }

    const manifest: CacheManifest = {
      key,
      digest: snapshot.digest,
      sizeBytes: snapshot.sizeBytes,
      savedAt: new Date().toISOString(),
      files: snapshot.files.map((file) => ({
        path: file.path,
        mode: file.mode,
        size: file.size,
        sha256: file.sha256,
      })),
    };
    await writeFile(join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
  }

  /**
   * Move the previous entry aside, rename the new one in, then drop the old one.
   * A concurrent writer can recreate the entry between the two renames; retry then.
   */
  private async swapIntoPlace(tmpDir: string, entryDir: string, encoded: string): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      const oldDir = join(this.root, `.old-${encoded}-${randomUUID()}`);
      let movedAside = false;
      try {
        await rename(entryDir, oldDir);
        movedAside = true;
      } catch (error) {
        if (!isMissing(error)) throw error;
      }

      try {
        await rename(tmpDir, entryDir);
        return;
      } catch (error) {
        const code = errorCode(error);
        if ((code !== 'ENOTEMPTY' && code !== 'EEXIST') || attempt >= MAX_SWAP_ATTEMPTS) {
          throw error;
        }
      } finally {
        if (movedAside) await rm(oldDir, { recursive: true, force: true });
      }
    }
  }
}
