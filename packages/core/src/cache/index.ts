/**
 * Build-output cache
 */

export { CacheManager } from './cache-manager.js';
export type { CacheManagerOptions } from './cache-manager.js';
export { deriveCacheKey, resolveHostOs } from './cache-key.js';
export {
  captureSnapshot,
  applySnapshot,
  computeDigest,
  createDirectorySnapshot,
  createMemorySnapshot,
} from './snapshot.js';
export type { SnapshotContent } from './snapshot.js';
export { MemoryCacheStore } from './memory-cache-store.js';
export { FileSystemCacheStore } from './filesystem-cache-store.js';
export type { CacheStore } from './types.js';
