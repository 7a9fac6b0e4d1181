import type { Logger } from "pino";
import type { CacheStore } from "./types.js";

export type CacheArgs = Record<string, unknown>;

export type CacheAsideOptions<A extends CacheArgs> = {
  namespace: string;
  operation: string;
  ttlSeconds: number;
  logger: Logger;
  /** Overrides the default `{namespace}:{operation}:{normalized args}` key. */
  key?: (args: A) => string;
};

function renderValue(v: unknown): string {
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean"
    ? String(v)
    : JSON.stringify(v);
}

/**
 * Stable rendering of the cache-relevant arguments: null/undefined dropped,
 * keys sorted, `k=v` joined by `&`. No arguments renders as `-`.
 */
export function normalizeArgs(args: CacheArgs): string {
  const parts = Object.keys(args)
    .filter((k) => args[k] !== undefined && args[k] !== null)
    .sort()
    .map((k) => `${k}=${renderValue(args[k])}`);
  return parts.length ? parts.join("&") : "-";
}

export function cacheKey(
  namespace: string,
  operation: string,
  args: CacheArgs,
): string {
  return `${namespace}:${operation}:${normalizeArgs(args)}`;
}

/** JSON with engine-internal (`_`-prefixed) fields stripped. */
export function serializeForCache(value: unknown): string {
  return JSON.stringify(value, (k, v: unknown) =>
    k.startsWith("_") ? undefined : v,
  );
}

/**
 * Wraps a read so results are served from and written to `store`.
 *
 * Only `args` take part in the key; `context` carries per-request handles
 * (persistence, principal). Any cache failure degrades to calling `fn`
 * directly and is logged, never raised.
 */
export function cacheAside<A extends CacheArgs, C, R>(
  store: CacheStore,
  fn: (args: A, context: C) => Promise<R>,
  options: CacheAsideOptions<A>,
): (args: A, context: C) => Promise<R> {
  const log = options.logger.child({
    component: "cache-aside",
    namespace: options.namespace,
    operation: options.operation,
  });
  const keyFor =
    options.key ??
    ((args: A) => cacheKey(options.namespace, options.operation, args));

  return async (args, context) => {
    const key = keyFor(args);

    let cached: string | null;
    try {
      cached = await store.get(key);
    } catch (e) {
      log.warn({ err: e, key }, "cache read failed; serving uncached");
      return fn(args, context);
    }

    if (cached !== null) {
      try {
        // stored by this wrapper from an R, minus internal fields
        return JSON.parse(cached) as R;
      } catch (e) {
        log.warn({ err: e, key }, "discarding unreadable cache entry");
      }
    }

    const result = await fn(args, context);
    try {
      const serialized = serializeForCache(result);
      if (serialized !== undefined) {
        await store.setWithExpiry(key, serialized, options.ttlSeconds);
      }
    } catch (e) {
      log.warn({ err: e, key }, "cache write failed");
    }
    return result;
  };
}

/**
 * Deletes every key matching each pattern. Failures are logged and
 * swallowed: the persistence write has already committed and the TTL bounds
 * how long a missed invalidation can serve stale data.
 */
export async function invalidate(
  store: CacheStore,
  patterns: Iterable<string>,
  logger: Logger,
): Promise<void> {
  const unique = [...new Set(patterns)];
  await Promise.all(
    unique.map(async (pattern) => {
      try {
        const removed = await store.deleteMatchingPattern(pattern);
        logger.debug({ pattern, removed }, "cache invalidated");
      } catch (e) {
        logger.warn({ err: e, pattern }, "cache invalidation failed");
      }
    }),
  );
}
