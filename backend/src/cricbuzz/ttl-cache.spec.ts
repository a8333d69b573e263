import { TtlCache } from "./ttl-cache";

describe("TtlCache", () => {
  it("expires entries after their ttl", () => {
    let now = 1_000;
    const cache = new TtlCache<string>(10, () => now);

    cache.set("k", "v", 30);
    now += 29_999;
    expect(cache.get("k")).toBe("v");

    now += 1;
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("drops expired entries on write instead of growing with unique keys", () => {
    let now = 0;
    const cache = new TtlCache<number>(3, () => now);

    for (let i = 0; i < 5000; i++) {
      cache.set(`player-${i}`, i, 1);
      now += 1_000;
    }

    expect(cache.size).toBeLessThanOrEqual(3);
    expect(cache.get("player-4999")).toBeUndefined();
  });

  it("evicts the oldest live entry when full", () => {
    const cache = new TtlCache<number>(2, () => 0);

    cache.set("a", 1, 60);
    cache.set("b", 2, 60);
    cache.set("a", 10, 60);
    cache.set("c", 3, 60);

    expect(cache.size).toBe(2);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(10);
    expect(cache.get("c")).toBe(3);
  });
});
