import { describe, expect, it } from "vitest";
import { ChunkCache, MAX_CACHED_CHUNKS } from "../chunk-cache";

describe("ChunkCache", () => {
  it("holds five chunks by default", () => {
    expect(MAX_CACHED_CHUNKS).toBe(5);
    expect(new ChunkCache().capacity).toBe(5);
  });

  it("evicts the lowest index once a sixth chunk arrives", () => {
    const cache = new ChunkCache();
    for (let i = 0; i < 5; i++) expect(cache.set(i, `c${i}`)).toEqual([]);
    expect(cache.set(5, "c5")).toEqual([0]);
    expect(cache.indices()).toEqual([1, 2, 3, 4, 5]);
    expect(cache.get(0)).toBeUndefined();
    expect(cache.get(5)).toBe("c5");
  });

  it("evicts by index even when the lowest index was the newest insert", () => {
    const cache = new ChunkCache();
    for (const i of [9, 8, 7, 6, 5]) cache.set(i, `c${i}`);
    expect(cache.set(2, "c2")).toEqual([2]);
    expect(cache.indices()).toEqual([5, 6, 7, 8, 9]);
  });

  it("does not evict when overwriting an existing entry", () => {
    const cache = new ChunkCache(2);
    cache.set(0, "a");
    cache.set(1, "b");
    expect(cache.set(1, "b2")).toEqual([]);
    expect(cache.size).toBe(2);
    expect(cache.get(1)).toBe("b2");
  });

  it("drops several entries when shrinking past a smaller capacity", () => {
    const cache = new ChunkCache(1);
    cache.set(3, "x");
    expect(cache.set(4, "y")).toEqual([3]);
    expect(cache.indices()).toEqual([4]);
  });

  it("clears everything", () => {
    const cache = new ChunkCache();
    cache.set(1, "a");
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.has(1)).toBe(false);
  });
});
