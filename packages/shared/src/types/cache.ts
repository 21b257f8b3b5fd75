/**
 * Cache entry types
 */

import type { Readable } from 'node:stream';

export interface SnapshotFile {
  /** Path relative to the snapshot root, always with forward slashes */
  path: string;
  /** POSIX mode bits */
  mode: number;
  size: number;
  /** Hex sha256 of the file contents */
  sha256: string;
}

/**
 * Snapshot of a build-output directory. The file list and digest are held
 * in memory; contents are read on demand through `openFile`.
 */
export interface DirectorySnapshot {
  files: SnapshotFile[];
  /** sha256 over sorted paths, modes, sizes and content hashes */
  digest: string;
  sizeBytes: number;
  openFile(path: string): Readable;
}

export interface CacheEntry {
  key: string;
  snapshot: DirectorySnapshot;
  savedAt: Date;
}
