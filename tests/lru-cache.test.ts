import { describe, expect, it } from "vitest";
import { LRUCache } from "../src/common/lru-cache";

describe("LRUCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new LRUCache<string, number>(2);
    cache.set("a", 1).set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.size).toBe(2);
  });

  it("computes a missing value once", () => {
    const cache = new LRUCache<string, number>(4);
    let calls = 0;
    const create = () => ++calls;

    expect(cache.getOrCreate("x", create)).toBe(1);
    expect(cache.getOrCreate("x", create)).toBe(1);
    expect(calls).toBe(1);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new LRUCache(0)).toThrow(RangeError);
  });
});
