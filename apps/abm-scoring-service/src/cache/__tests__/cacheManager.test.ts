import { CacheManager, cacheKey } from "../cacheManager";
import { computeScore } from "../../services/scoring";
import { parseEntity } from "../../types/entities";
import { ValidationError } from "../../utils/errors";

describe("CacheManager", () => {
  let now: number;
  const clock = () => now;
  const score = computeScore(parseEntity({ id: "c-1", type: "company" }), "company");

  beforeEach(() => {
    now = 1_000_000;
  });

  describe("cacheKey", () => {
    it("should depend only on kind, type and id", () => {
      const first = cacheKey("c-1", "company", "score");
      now += 3_600_000;

      expect(cacheKey("c-1", "company", "score")).toBe(first);
      expect(cacheKey("c-1", "contact", "score")).not.toBe(first);
      expect(cacheKey("c-1", "company", "entity")).not.toBe(first);
      expect(first).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  it("should keep each kind in its own cache", () => {
    const cache = new CacheManager({}, clock);
    cache.cacheScore("c-1", "company", score);
    cache.cacheEntity("c-1", "company", { name: "Acme" });
    cache.cachePrompt("c-1", "company", "prompt text");

    expect(cache.getScore("c-1", "company")).toBe(score);
    expect(cache.getScore("c-1", "contact")).toBeUndefined();
    expect(cache.getEntity("c-1", "company")).toEqual({ name: "Acme" });
    expect(cache.getPrompt("c-1", "company")).toBe("prompt text");
  });

  it("should expire entries per cache TTL", () => {
    const cache = new CacheManager(
      { entity: { maxSize: 10, ttlSeconds: 60 }, score: { maxSize: 10, ttlSeconds: 600 } },
      clock
    );
    cache.cacheEntity("c-1", "company", { name: "Acme" });
    cache.cacheScore("c-1", "company", score);

    now += 61_000;
    expect(cache.getEntity("c-1", "company")).toBeUndefined();
    expect(cache.getScore("c-1", "company")).toBe(score);
  });

  it("should clear one cache or all of them", () => {
    const cache = new CacheManager({}, clock);
    cache.cacheScore("c-1", "company", score);
    cache.cachePrompt("c-1", "company", "prompt text");

    cache.clear("score");
    expect(cache.getScore("c-1", "company")).toBeUndefined();
    expect(cache.getPrompt("c-1", "company")).toBe("prompt text");

    cache.clear();
    expect(cache.getPrompt("c-1", "company")).toBeUndefined();
  });

  it("should reject unknown cache kinds", () => {
    const cache = new CacheManager({}, clock);
    expect(() => cache.clear("sessions")).toThrow(ValidationError);
  });

  it("should invalidate everything cached for one entity", () => {
    const cache = new CacheManager({}, clock);
    cache.cacheScore("c-1", "company", score);
    cache.cacheEntity("c-1", "company", { name: "Acme" });
    cache.cacheEntity("c-2", "company", { name: "Other" });

    cache.invalidate("c-1", "company");

    expect(cache.getScore("c-1", "company")).toBeUndefined();
    expect(cache.getEntity("c-1", "company")).toBeUndefined();
    expect(cache.getEntity("c-2", "company")).toEqual({ name: "Other" });
  });

  it("should report size, capacity and TTL", () => {
    const cache = new CacheManager({ prompt: { maxSize: 3, ttlSeconds: 30 } }, clock);
    cache.cachePrompt("c-1", "company", "a");

    expect(cache.stats()).toEqual({
      entity: { size: 0, maxsize: 1000, ttl: 3600 },
      score: { size: 0, maxsize: 5000, ttl: 86400 },
      prompt: { size: 1, maxsize: 3, ttl: 30 },
    });
  });
});
