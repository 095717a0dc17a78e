import { describe, test, expect, jest } from "@jest/globals";
import { TtlCache } from "../cache.js";

describe("TtlCache", () => {
  test("should serve entries until the window closes", () => {
    let now = 1_000;
    const cache = new TtlCache<string>(500, () => now);

    cache.set("a", "first");
    now = 1_499;
    expect(cache.get("a")).toBe("first");

    now = 1_500;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test("should drop expired entries when new ones are written", () => {
    let now = 0;
    const cache = new TtlCache<number>(100, () => now);

    for (let i = 0; i < 10_001; i += 1) {
      cache.set(`query-${i}`, i);
      now += 101;
    }

    expect(cache.size).toBe(1);
    expect(cache.get("query-10000")).toBeUndefined();
  });

  test("should evict the oldest entries past the size limit", () => {
    const cache = new TtlCache<number>(60_000, () => 0, 2);

    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("a", 10);
    cache.set("c", 3);

    expect(cache.size).toBe(2);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(10);
    expect(cache.get("c")).toBe(3);
  });

  test("should not store anything when the ttl is zero", () => {
    const cache = new TtlCache<string>(0, () => 0);

    cache.set("a", "first");

    expect(cache.get("a")).toBeUndefined();
  });

  test("should load once per key within the window", async () => {
    const cache = new TtlCache<number>(60_000, () => 0);
    const load = jest.fn(async () => 7);

    expect(await cache.getOrLoad("k", load)).toBe(7);
    expect(await cache.getOrLoad("k", load)).toBe(7);
    expect(load).toHaveBeenCalledTimes(1);
  });

  test("should not cache rejected loads", async () => {
    const cache = new TtlCache<number>(60_000, () => 0);
    const load = jest
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error("offline"))
      .mockResolvedValueOnce(3);

    await expect(cache.getOrLoad("k", load)).rejects.toThrow("offline");
    expect(await cache.getOrLoad("k", load)).toBe(3);
    expect(load).toHaveBeenCalledTimes(2);
  });

  test("should cache null results", async () => {
    const cache = new TtlCache<number[] | null>(60_000, () => 0);
    const load = jest.fn(async (): Promise<number[] | null> => null);

    await cache.getOrLoad("k", load);
    await cache.getOrLoad("k", load);

    expect(load).toHaveBeenCalledTimes(1);
  });
});
