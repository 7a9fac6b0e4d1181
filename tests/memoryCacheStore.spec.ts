import { describe, it, expect } from "vitest";
import { MemoryCacheStore } from "../src/cache/memoryCacheStore.js";
import { escapeGlob, globToRegExp } from "../src/cache/glob.js";

function clocked() {
  let now = 0;
  const store = new MemoryCacheStore({ now: () => now });
  return {
    store,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("globToRegExp", () => {
  const matches = (pattern: string, key: string) =>
    globToRegExp(pattern).test(key);

  it("follows Redis MATCH semantics", () => {
    expect(matches("products:*", "products:list:-")).toBe(true);
    expect(matches("products:*", "product:get:id=1")).toBe(false);
    expect(matches("product:get:id=?", "product:get:id=7")).toBe(true);
    expect(matches("product:get:id=?", "product:get:id=17")).toBe(false);
    expect(matches("category:[12]:*", "category:2:products:list:-")).toBe(true);
    expect(matches("category:[^12]:*", "category:2:products:list:-")).toBe(false);
    expect(matches("category:[a-c]x", "category:bx")).toBe(true);
    expect(matches("a\\*b", "a*b")).toBe(true);
    expect(matches("a\\*b", "axb")).toBe(false);
  });

  it("treats regex metacharacters literally", () => {
    expect(matches("k.(v)+", "k.(v)+")).toBe(true);
    expect(matches("k.(v)+", "kx(v)+")).toBe(false);
  });

  it("escapeGlob makes a literal pattern", () => {
    const literal = "orders:we*ird?[id]";
    expect(matches(escapeGlob(literal), literal)).toBe(true);
    expect(matches(escapeGlob(literal), "orders:weXirdQi")).toBe(false);
  });
});

describe("MemoryCacheStore", () => {
  it("never returns an entry past its expiration", async () => {
    const { store, advance } = clocked();
    await store.setWithExpiry("k", "v", 10);

    advance(9_999);
    expect(await store.get("k")).toBe("v");
    advance(1);
    expect(await store.get("k")).toBeNull();
  });

  it("reports remaining TTL like Redis", async () => {
    const { store, advance } = clocked();
    await store.setWithExpiry("k", "v", 10);
    advance(2_500);
    expect(await store.ttl("k")).toBe(8);
    expect(await store.ttl("missing")).toBe(-2);
  });

  it("rejects a non-positive TTL", async () => {
    const { store } = clocked();
    await expect(store.setWithExpiry("k", "v", 0)).rejects.toThrow(
      "ttlSeconds must be > 0 (got 0)",
    );
  });

  it("deletes every key matching a pattern and counts them", async () => {
    const { store } = clocked();
    await store.setWithExpiry("products:list:-", "[]", 60);
    await store.setWithExpiry("products:list:limit=5", "[]", 60);
    await store.setWithExpiry("product:get:id=1", "{}", 60);

    expect(await store.deleteMatchingPattern("products:*")).toBe(2);
    expect(store.keys()).toEqual(["product:get:id=1"]);
  });

  it("does not count expired keys", async () => {
    const { store, advance } = clocked();
    await store.setWithExpiry("a:1", "x", 1);
    await store.setWithExpiry("a:2", "x", 60);
    advance(5_000);

    expect(await store.deleteMatchingPattern("a:*")).toBe(1);
    expect(store.keys()).toEqual([]);
  });

  it("delete removes a single key", async () => {
    const { store } = clocked();
    await store.setWithExpiry("k", "v", 60);
    await store.delete("k");
    expect(await store.get("k")).toBeNull();
  });

  it("take hands a value to exactly one of several concurrent callers", async () => {
    const { store, advance } = clocked();
    await store.setWithExpiry("k", "v", 60);

    const taken = await Promise.all([store.take("k"), store.take("k"), store.take("k")]);
    expect(taken.filter((v) => v !== null)).toEqual(["v"]);
    expect(await store.get("k")).toBeNull();

    await store.setWithExpiry("old", "v", 1);
    advance(1_000);
    expect(await store.take("old")).toBeNull();
  });
});
