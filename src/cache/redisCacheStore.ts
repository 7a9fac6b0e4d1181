import { Redis } from "ioredis";
import type { Logger } from "pino";
import type { CacheStore } from "./types.js";

export type RedisCacheStoreOptions = {
  url: string;
  /** Per-command timeout; a slow Redis turns into a rejected promise. */
  commandTimeoutMs: number;
  scanCount?: number;
  logger: Logger;
};

export class RedisCacheStore implements CacheStore {
  private scanCount: number;

  constructor(
    private readonly redis: Redis,
    logger: Logger,
    scanCount = 200,
  ) {
    this.scanCount = scanCount;
    const log = logger.child({ component: "redis" });
    // ioredis reports unhandled "error" events on stderr
    redis.on("error", (e: unknown) => {
      log.warn({ err: e }, "redis connection error");
    });
  }

  static connect(opts: RedisCacheStoreOptions): RedisCacheStore {
    const redis = new Redis(opts.url, {
      commandTimeout: opts.commandTimeoutMs,
      connectTimeout: Math.max(opts.commandTimeoutMs, 1000),
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      lazyConnect: false,
    });
    return new RedisCacheStore(redis, opts.logger, opts.scanCount);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<void> {
    await this.redis.setex(key, Math.ceil(ttlSeconds), value);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async take(key: string): Promise<string | null> {
    return this.redis.getdel(key);
  }

  // SCAN rather than KEYS so a large keyspace does not block the server.
  async deleteMatchingPattern(pattern: string): Promise<number> {
    let cursor = "0";
    let removed = 0;
    do {
      const [next, keys] = await this.redis.scan(
        cursor,
        "MATCH",
        pattern,
        "COUNT",
        this.scanCount,
      );
      cursor = next;
      if (keys.length > 0) removed += await this.redis.del(...keys);
    } while (cursor !== "0");
    return removed;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
