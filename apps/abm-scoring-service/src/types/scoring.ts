import { KnownEntityType } from "./entities";

// ============================================================================
// SCORING TYPES
// ============================================================================

/** Which sub-score a signal contributes to */
export type ScoreDimension = "crm" | "industry";

export interface ScoreComponents {
  /** Signals that fired, in rule-table order */
  signals: string[];
  /** Contribution of each fired signal */
  weights: Record<string, number>;
}

/**
 * Result of scoring one entity.
 * All scores are in [0, 1]; total_score = base_score + crm_score + industry_score, capped.
 */
export interface ScoreResult {
  crm_score: number;
  industry_score: number;
  total_score: number;
  base_score: number;
  components: ScoreComponents;
  entity_id: string;
  entity_type: KnownEntityType;
  scoring_version: string;
  scored_at: string;
}

export type WeightTable = Record<string, number>;

export type WeightTables = Record<KnownEntityType, WeightTable>;

export function isScoreResult(value: unknown): value is ScoreResult {
  if (typeof value !== "object" || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.total_score === "number" &&
    typeof candidate.entity_id === "string" &&
    typeof candidate.components === "object" &&
    candidate.components !== null
  );
}
