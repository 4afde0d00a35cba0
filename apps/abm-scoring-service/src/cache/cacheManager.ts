import { createHash } from "crypto";
import { ScoreResult } from "../types/scoring";
import { EntityProperties } from "../types/entities";
import { ValidationError } from "../utils/errors";
import { Clock, TtlCache } from "./ttlCache";

// ============================================================================
// CONFIG
// ============================================================================

export const CACHE_KINDS = ["entity", "score", "prompt"] as const;

export type CacheKind = (typeof CACHE_KINDS)[number];

export interface CacheSettings {
  maxSize: number;
  ttlSeconds: number;
}

export type CacheConfig = Record<CacheKind, CacheSettings>;

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  entity: { maxSize: 1000, ttlSeconds: 3600 }, // 1 hour
  score: { maxSize: 5000, ttlSeconds: 86400 }, // 24 hours
  prompt: { maxSize: 1000, ttlSeconds: 3600 }, // 1 hour
};

/** What each cache holds */
interface CacheValues {
  entity: EntityProperties;
  score: ScoreResult;
  prompt: string;
}

export interface CacheStats {
  size: number;
  maxsize: number;
  ttl: number;
}

export function isCacheKind(value: unknown): value is CacheKind {
  return typeof value === "string" && (CACHE_KINDS as readonly string[]).includes(value);
}

/**
 * Stable key for an entity in one cache.
 * Built only from identity; expiry lives in the cache entry, never in the key.
 */
export function cacheKey(entityId: string, entityType: string, kind: CacheKind): string {
  return createHash("sha256")
    .update(JSON.stringify([kind, entityType, entityId]))
    .digest("hex");
}

// ============================================================================
// CACHE MANAGER
// ============================================================================

/**
 * Owns the three upstream-result caches: CRM entities, score results and rendered prompts.
 * It only stores what callers computed; a miss means the caller recomputes and writes back.
 */
export class CacheManager {
  private readonly caches: { [K in CacheKind]: TtlCache<CacheValues[K]> };

  constructor(config: Partial<CacheConfig> = {}, clock?: Clock) {
    const settings: CacheConfig = { ...DEFAULT_CACHE_CONFIG, ...config };
    this.caches = {
      entity: new TtlCache<EntityProperties>({ ...settings.entity, clock }),
      score: new TtlCache<ScoreResult>({ ...settings.score, clock }),
      prompt: new TtlCache<string>({ ...settings.prompt, clock }),
    };
  }

  get<K extends CacheKind>(kind: K, entityId: string, entityType: string): CacheValues[K] | undefined {
    const cache: TtlCache<CacheValues[K]> = this.caches[kind];
    return cache.get(cacheKey(entityId, entityType, kind));
  }

  set<K extends CacheKind>(kind: K, entityId: string, entityType: string, value: CacheValues[K]): void {
    const cache: TtlCache<CacheValues[K]> = this.caches[kind];
    cache.set(cacheKey(entityId, entityType, kind), value);
  }

  getEntity(entityId: string, entityType: string): EntityProperties | undefined {
    return this.get("entity", entityId, entityType);
  }

  cacheEntity(entityId: string, entityType: string, data: EntityProperties): void {
    this.set("entity", entityId, entityType, data);
  }

  getScore(entityId: string, entityType: string): ScoreResult | undefined {
    return this.get("score", entityId, entityType);
  }

  cacheScore(entityId: string, entityType: string, score: ScoreResult): void {
    this.set("score", entityId, entityType, score);
  }

  getPrompt(entityId: string, entityType: string): string | undefined {
    return this.get("prompt", entityId, entityType);
  }

  cachePrompt(entityId: string, entityType: string, prompt: string): void {
    this.set("prompt", entityId, entityType, prompt);
  }

  /**
   * Drop everything cached for one entity
   */
  invalidate(entityId: string, entityType: string): void {
    for (const kind of CACHE_KINDS) {
      this.caches[kind].delete(cacheKey(entityId, entityType, kind));
    }
  }

  /**
   * Clear one cache, or all of them when no kind is given
   */
  clear(kind?: string): void {
    if (kind === undefined) {
      for (const k of CACHE_KINDS) this.caches[k].clear();
      return;
    }
    if (!isCacheKind(kind)) {
      throw new ValidationError(`Unknown cache type: ${kind}`, { cache_type: kind, allowed: CACHE_KINDS });
    }
    this.caches[kind].clear();
  }

  stats(): Record<CacheKind, CacheStats> {
    const describe = <V>(cache: TtlCache<V>): CacheStats => ({
      size: cache.size,
      maxsize: cache.maxSize,
      ttl: cache.ttlSeconds,
    });
    return {
      entity: describe(this.caches.entity),
      score: describe(this.caches.score),
      prompt: describe(this.caches.prompt),
    };
  }
}
