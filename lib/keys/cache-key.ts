/**
 * Identifies one cached dependency tree
 *
 * The same manifest contents on the same platform always yield the same key.
 */
export interface CacheKey {
  readonly platformId: string;
  readonly contentHash: string;
}

export function cacheKeyString(key: CacheKey): string {
  return `${key.platformId}-${key.contentHash}`;
}
