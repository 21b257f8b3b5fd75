/**
 * Cache key derivation
 */

const RUNNER_OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'Linux',
  darwin: 'macOS',
  win32: 'Windows',
};

/**
 * Host OS component of the cache key, named as CI runners name it.
 * An explicit override wins; unknown platforms use the Node platform name.
 */
export function resolveHostOs(override?: string, platform: NodeJS.Platform = process.platform): string {
  if (override) return override;
  return RUNNER_OS_NAMES[platform] ?? platform;
}

export function deriveCacheKey(os: string, fingerprint: string): string {
  return `${os}-${fingerprint}`;
}
