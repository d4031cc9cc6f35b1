import { describe, expect, it } from "vitest";
import { cacheKey, TtlCache } from "../src/infra/cache/ttlCache.js";

function createClock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("TtlCache", () => {
  it("returns entries until their TTL elapses", () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ defaultTtlSeconds: 10, now: clock.now });

    cache.put("a", "alpha");
    clock.advance(9_999);
    expect(cache.get("a")).toBe("alpha");

    clock.advance(1);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("honours a per-entry TTL", () => {
    const clock = createClock();
    const cache = new TtlCache<number>({ defaultTtlSeconds: 60, now: clock.now });

    cache.put("short", 1, 1);
    cache.put("long", 2);
    clock.advance(1_500);

    expect(cache.has("short")).toBe(false);
    expect(cache.get("long")).toBe(2);
  });

  it("overwrites an existing key and restarts its TTL", () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ defaultTtlSeconds: 2, now: clock.now });

    cache.put("k", "old");
    clock.advance(1_500);
    cache.put("k", "new");
    clock.advance(1_500);

    expect(cache.get("k")).toBe("new");
  });

  it("sweeps expired entries in bulk", () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ defaultTtlSeconds: 5, now: clock.now });

    cache.put("a", "1", 1);
    cache.put("b", "2", 1);
    cache.put("c", "3");
    clock.advance(2_000);

    expect(cache.size).toBe(3);
    expect(cache.sweep()).toBe(2);
    expect(cache.size).toBe(1);
  });

  it("deletes and clears entries", () => {
    const cache = new TtlCache<string>({ defaultTtlSeconds: 5 });
    cache.put("a", "1");
    cache.put("b", "2");

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("rejects non-positive TTLs", () => {
    expect(() => new TtlCache<string>({ defaultTtlSeconds: 0 })).toThrow(RangeError);
    const cache = new TtlCache<string>({ defaultTtlSeconds: 5 });
    expect(() => cache.put("a", "1", -1)).toThrow("TTL must be a positive number of seconds, got -1");
  });

  it("disposes the sweeper and entries", () => {
    const cache = new TtlCache<string>({ defaultTtlSeconds: 5 });
    cache.put("a", "1");
    cache.startSweeper(1_000);
    cache.dispose();

    expect(cache.size).toBe(0);
  });
});

describe("cacheKey", () => {
  it("is stable per namespace and arguments", () => {
    expect(cacheKey("web_search", "sereleia", 6)).toBe(cacheKey("web_search", "sereleia", 6));
    expect(cacheKey("web_search", "sereleia", 6)).not.toBe(cacheKey("web_search", "sereleia", 5));
    expect(cacheKey("web_search", "q")).not.toBe(cacheKey("router.classify", "q"));
    expect(cacheKey("web_search", "q").startsWith("web_search:")).toBe(true);
  });
});
