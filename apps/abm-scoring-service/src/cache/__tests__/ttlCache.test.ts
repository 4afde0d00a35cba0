import { TtlCache } from "../ttlCache";

describe("TtlCache", () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  it("should return values until their TTL has passed", () => {
    const cache = new TtlCache<string>({ maxSize: 10, ttlSeconds: 60, clock });
    cache.set("a", "alpha");

    now += 60_000;
    expect(cache.get("a")).toBe("alpha");

    now += 1;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("should restart the TTL when a key is set again", () => {
    const cache = new TtlCache<number>({ maxSize: 10, ttlSeconds: 10, clock });
    cache.set("a", 1);
    now += 8_000;
    cache.set("a", 2);
    now += 8_000;

    expect(cache.get("a")).toBe(2);
  });

  it("should evict the least recently used entry when full", () => {
    const cache = new TtlCache<number>({ maxSize: 2, ttlSeconds: 60, clock });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
  });

  it("should purge expired entries before evicting live ones", () => {
    const cache = new TtlCache<number>({ maxSize: 2, ttlSeconds: 10, clock });
    cache.set("old", 1);
    now += 5_000;
    cache.set("b", 2);
    now += 6_000;
    cache.set("c", 3);

    expect(cache.get("b")).toBe(2);
    expect(cache.get("c")).toBe(3);
    expect(cache.size).toBe(2);
  });

  it("should delete and clear entries", () => {
    const cache = new TtlCache<number>({ maxSize: 5, ttlSeconds: 60, clock });
    cache.set("a", 1);
    cache.set("b", 2);

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("should reject invalid settings", () => {
    expect(() => new TtlCache({ maxSize: 0, ttlSeconds: 60 })).toThrow(RangeError);
    expect(() => new TtlCache({ maxSize: 1.5, ttlSeconds: 60 })).toThrow(RangeError);
    expect(() => new TtlCache({ maxSize: 10, ttlSeconds: 0 })).toThrow(RangeError);
  });
});
