/**
 * Key/value store with per-key expiry and glob-pattern bulk deletion.
 * Every method may reject when the backing store is unreachable; callers
 * decide whether that fails open or surfaces.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Reads and deletes in one step; of concurrent callers only one sees the value. */
  take(key: string): Promise<string | null>;
  /** Returns the number of keys removed. */
  deleteMatchingPattern(pattern: string): Promise<number>;
}
