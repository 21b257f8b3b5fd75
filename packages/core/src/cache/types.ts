/**
 * Cache store protocol
 */

import type { CacheEntry, DirectorySnapshot } from '@pipewright/shared';

/**
 * Exact-key storage for build-output snapshots.
 * `put` replaces any existing entry (last writer wins) and reads the
 * contents through `snapshot.openFile`.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  put(key: string, snapshot: DirectorySnapshot): Promise<void>;
}
