import type { CacheStore } from "./types.js";
import { globToRegExp } from "./glob.js";

type Entry = { value: string; expiresAt: number };

export type MemoryCacheStoreOptions = {
  now?: () => number;
};

/**
 * Process-local {@link CacheStore}. Expired entries are dropped lazily on
 * read and during pattern scans.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, Entry>();
  private now: () => number;

  constructor(opts: MemoryCacheStoreOptions = {}) {
    this.now = opts.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<void> {
    if (!(ttlSeconds > 0)) {
      throw new Error(`ttlSeconds must be > 0 (got ${ttlSeconds})`);
    }
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async take(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    return entry && this.now() < entry.expiresAt ? entry.value : null;
  }

  async deleteMatchingPattern(pattern: string): Promise<number> {
    const re = globToRegExp(pattern);
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        continue;
      }
      if (re.test(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Remaining lifetime in whole seconds, or -2 when absent (Redis TTL). */
  async ttl(key: string): Promise<number> {
    const entry = this.entries.get(key);
    if (!entry || this.now() >= entry.expiresAt) return -2;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  keys(): string[] {
    const now = this.now();
    return [...this.entries]
      .filter(([, e]) => now < e.expiresAt)
      .map(([k]) => k);
  }
}
