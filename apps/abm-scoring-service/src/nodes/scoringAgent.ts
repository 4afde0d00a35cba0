import { Node, NodeData } from "../pipeline/node";
import { CacheManager } from "../cache/cacheManager";
import { Entity, KnownEntityType, identityType, parseEntity } from "../types/entities";
import { ScoreResult, WeightTable } from "../types/scoring";
import { ScoringWeights, computeScore as applyRules } from "../services/scoring";
import { ProcessingError } from "../utils/errors";

export type ScoringOutput = {
  score: ScoreResult;
};

/**
 * Scores one entity against the rule table for its type.
 * Results are cached per (entity_id, entity_type). The cache holds its own copy,
 * so callers may mutate what they get back.
 */
export class ScoringAgent extends Node<ScoringOutput> {
  constructor(
    private readonly cache: CacheManager,
    readonly weights: ScoringWeights = new ScoringWeights()
  ) {
    super({
      name: "ScoringAgent",
      description: "Scores CRM entities from weighted CRM and industry signals",
      inputs: ["entity"],
      outputs: ["score"],
    });
  }

  async run(inputs: NodeData): Promise<ScoringOutput> {
    const entity = parseEntity(inputs.entity);

    const cacheType = identityType(entity);
    const cached = this.cache.getScore(entity.id, cacheType);
    if (cached) {
      console.log(`[scoring] Cache hit for ${cacheType} ${entity.id}`);
      return { score: structuredClone(cached) };
    }

    let scoringType: KnownEntityType;
    if (entity.entity_type === "unknown") {
      console.warn(`[scoring] Unknown entity type '${entity.declared_type}' for ${entity.id}, scoring as company`);
      scoringType = "company";
    } else {
      scoringType = entity.entity_type;
    }

    const score = this.computeScore(entity, scoringType);
    if (!Number.isFinite(score.total_score) || score.total_score < 0 || score.total_score > 1) {
      throw new ProcessingError(`Score out of range: ${score.total_score}`, {
        entity_id: entity.id,
        entity_type: entity.entity_type,
      });
    }

    this.cache.cacheScore(entity.id, cacheType, structuredClone(score));
    console.log(`[scoring] Scored ${entity.entity_type} ${entity.id}: ${score.total_score}`, {
      signals: score.components.signals,
    });
    return { score };
  }

  /**
   * Apply the current weights, with optional per-call overrides, without touching the cache
   */
  computeScore(entity: Entity, scoringType: KnownEntityType, overrides?: WeightTable): ScoreResult {
    return applyRules(entity, scoringType, { ...this.weights.get(scoringType), ...overrides });
  }
}
