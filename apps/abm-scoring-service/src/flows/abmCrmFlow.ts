import { z } from "zod";
import { Pipeline, PipelineStatus, NodeFailure } from "../pipeline/pipeline";
import { CacheManager } from "../cache/cacheManager";
import { DocumentStore } from "../db/client";
import { CrmClient } from "../services/crmClient";
import { ScoringWeights } from "../services/scoring";
import { Scheduler, TaskFn } from "../scheduler/scheduler";
import { CrmFeedNode, EnrichmentReport, isEnrichmentReport } from "../nodes/crmFeed";
import { ScoringAgent } from "../nodes/scoringAgent";
import { PersistenceNode, PersistenceResult, isPersistenceResult } from "../nodes/persistence";
import {
  Entity,
  EntityProperties,
  EntityType,
  KNOWN_ENTITY_TYPES,
  KnownEntityType,
  entityRef,
  isPlainObject,
  parseEntity,
} from "../types/entities";
import { ScoreResult, WeightTable, WeightTables, isScoreResult } from "../types/scoring";
import { IntegrationError, ValidationError, describeError, errorMessage } from "../utils/errors";

// ============================================================================
// WEBHOOK PAYLOAD
// ============================================================================

export const WebhookEventSchema = z
  .object({
    event_type: z.string().optional(),
    data: z.record(z.unknown()),
  })
  .passthrough();

export type WebhookEvent = z.infer<typeof WebhookEventSchema>;

function eventPrefix(eventType: string | undefined): string | undefined {
  if (!eventType || !eventType.includes(".")) return undefined;
  return eventType.split(".")[0];
}

function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === "string" && value.trim() !== "") return value;
  }
  return undefined;
}

/**
 * Turn a webhook payload into a validated entity.
 * Type comes from data.type, then data.entity_type, then the event_type prefix ("company.created").
 */
export function resolveWebhookEvent(payload: unknown): Entity {
  const parsed = WebhookEventSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid webhook payload: ${issue.path.join(".") || "root"} ${issue.message}`);
  }

  const { event_type: eventType, data } = parsed.data;
  const raw: EntityProperties = { ...data };
  delete raw.type;
  raw.entity_type = firstString(data.type, data.entity_type, eventPrefix(eventType));

  return parseEntity(raw);
}

// ============================================================================
// RESULTS
// ============================================================================

export interface FlowResult {
  status: PipelineStatus;
  entity_id: string;
  entity_type: EntityType;
  scores: ScoreResult | null;
  persistence: PersistenceResult | null;
  enrichment: EnrichmentReport | null;
  errors: NodeFailure[];
  duration_ms: number;
}

export interface SweepOptions {
  entityType: KnownEntityType;
  limit: number;
}

export interface SweepSummary {
  entity_type: KnownEntityType;
  fetched: number;
  success: number;
  partial_success: number;
  error: number;
  /** Scores written back to the CRM */
  updated: number;
  /** Write-backs that failed; the stored score is kept */
  update_errors: number;
}

export interface AbmCrmFlowOptions {
  cache: CacheManager;
  store: DocumentStore;
  crm?: CrmClient | null;
  weights?: ScoringWeights;
  promptTemplate?: string;
}

// Node ids inside the pipeline
const CRM = "crm";
const SCORING = "scoring";
const PERSISTENCE = "persistence";

// ============================================================================
// FLOW
// ============================================================================

/**
 * CRM event → enrich → score → persist.
 * process() is the webhook entry point, sweep() the scheduled one.
 */
export class AbmCrmFlow {
  readonly pipeline: Pipeline;
  readonly cache: CacheManager;
  readonly weights: ScoringWeights;
  private readonly scoring: ScoringAgent;
  private readonly store: DocumentStore;
  private readonly crm: CrmClient | null;
  private readonly counts: Record<PipelineStatus, number> = { success: 0, partial_success: 0, error: 0 };

  constructor(options: AbmCrmFlowOptions) {
    this.cache = options.cache;
    this.store = options.store;
    this.crm = options.crm ?? null;
    this.weights = options.weights ?? new ScoringWeights();
    this.scoring = new ScoringAgent(this.cache, this.weights);

    this.pipeline = new Pipeline(
      "abm_crm_flow",
      "Enriches CRM entities, scores them and stores the result",
      {
        [CRM]: new CrmFeedNode(this.cache, { crm: this.crm, promptTemplate: options.promptTemplate }),
        [SCORING]: this.scoring,
        [PERSISTENCE]: new PersistenceNode(this.store),
      },
      [
        { sourceNode: CRM, sourceOutput: "entity", targetNode: SCORING, targetInput: "entity" },
        { sourceNode: CRM, sourceOutput: "entity", targetNode: PERSISTENCE, targetInput: "entity" },
        { sourceNode: SCORING, sourceOutput: "score", targetNode: PERSISTENCE, targetInput: "scores" },
      ]
    );
  }

  /**
   * Handle one CRM event. Never throws; failures are reported in the result.
   */
  async process(event: unknown): Promise<FlowResult> {
    const startTime = Date.now();

    let entity: Entity;
    try {
      entity = resolveWebhookEvent(event);
    } catch (error) {
      const data = isPlainObject(event) && isPlainObject(event.data) ? event.data : {};
      const ref = entityRef(data);
      return this.record(this.rejected(ref.entityId, ref.entityType, error, startTime));
    }

    try {
      const run = await this.pipeline.execute(
        { entity },
        { entity_id: entity.id, entity_type: entity.entity_type }
      );

      const scores = run.outputs[SCORING]?.score;
      const persistence = run.outputs[PERSISTENCE]?.result;
      const enrichment = run.outputs[CRM]?.enrichment;

      let status = run.status;
      if (
        status === "success" &&
        isPersistenceResult(persistence) &&
        (persistence.status === "error" || persistence.status === "partially_serialized")
      ) {
        status = "partial_success";
      }

      return this.record({
        status,
        entity_id: entity.id,
        entity_type: entity.entity_type,
        scores: isScoreResult(scores) ? scores : null,
        persistence: isPersistenceResult(persistence) ? persistence : null,
        enrichment: isEnrichmentReport(enrichment) ? enrichment : null,
        errors: run.errors,
        duration_ms: Date.now() - startTime,
      });
    } catch (error) {
      return this.record(this.rejected(entity.id, entity.entity_type, error, startTime));
    }
  }

  /**
   * Re-score up to `limit` entities of one type straight from the CRM,
   * then write each new score back to it. A failed write-back is counted, not thrown.
   */
  async sweep({ entityType, limit }: SweepOptions): Promise<SweepSummary> {
    if (!this.crm) {
      throw new IntegrationError("No CRM client configured for sweeps", { entity_type: entityType });
    }

    let records: EntityProperties[];
    try {
      records = await this.crm.listEntities(entityType, limit);
    } catch (error) {
      if (error instanceof IntegrationError) throw error;
      throw new IntegrationError(`Listing ${entityType} from ${this.crm.name} failed: ${errorMessage(error)}`, {
        entity_type: entityType,
      });
    }

    const batch = records.slice(0, limit);
    const summary: SweepSummary = {
      entity_type: entityType,
      fetched: batch.length,
      success: 0,
      partial_success: 0,
      error: 0,
      updated: 0,
      update_errors: 0,
    };

    for (const record of batch) {
      const { entityId } = entityRef(record);
      this.cache.invalidate(entityId, entityType);

      const result = await this.process({ event_type: `${entityType}.sweep`, data: { ...record, type: entityType } });
      summary[result.status] += 1;

      if (result.scores) {
        if (await this.writeBack(entityType, result.entity_id, result.scores)) {
          summary.updated += 1;
        } else {
          summary.update_errors += 1;
        }
      }
    }

    console.log(`[flow] Sweep of ${entityType} finished`, summary);
    return summary;
  }

  /**
   * Score an entity with the current weights, bypassing cache and storage.
   * `overrides` replace individual weights for this call only.
   */
  score(raw: unknown, overrides?: WeightTable): ScoreResult {
    const entity = parseEntity(raw);
    const scoringType = entity.entity_type === "unknown" ? "company" : entity.entity_type;
    return this.scoring.computeScore(entity, scoringType, overrides);
  }

  /**
   * Result for a webhook body that could not even be read
   */
  rejectPayload(error: unknown): FlowResult {
    return this.record(this.rejected("unknown-id", "company", error, Date.now()));
  }

  updateWeights(entityType: KnownEntityType, updates: Record<string, number>): WeightTable {
    const table = this.weights.update(entityType, updates);
    this.cache.clear("score");
    console.log(`[flow] Weights updated for ${entityType}, score cache cleared`);
    return table;
  }

  resetWeights(): WeightTables {
    const tables = this.weights.reset();
    this.cache.clear("score");
    console.log("[flow] Weights reset to defaults, score cache cleared");
    return tables;
  }

  status() {
    return {
      ...this.pipeline.describe(),
      crm: this.crm?.name ?? null,
      store: this.store.backend,
      processed: { ...this.counts },
      cache: this.cache.stats(),
    };
  }

  private async writeBack(entityType: KnownEntityType, entityId: string, scores: ScoreResult): Promise<boolean> {
    if (!this.crm) return false;
    try {
      await this.crm.updateScore(entityType, entityId, scores);
      return true;
    } catch (error) {
      const report = describeError(error, { flow: this.pipeline.name, entity_id: entityId, entity_type: entityType });
      console.error(`[flow] Score write-back failed: ${report.message}`, report.context);
      return false;
    }
  }

  private rejected(entityId: string, entityType: EntityType, error: unknown, startTime: number): FlowResult {
    const report = describeError(error, { flow: this.pipeline.name, entity_id: entityId });
    console.error(`[flow] Rejected event: ${report.message}`, report.context);
    return {
      status: "error",
      entity_id: entityId,
      entity_type: entityType,
      scores: null,
      persistence: null,
      enrichment: null,
      errors: [{ node: "input", error_type: report.error_type, message: report.message, timestamp: report.context.timestamp }],
      duration_ms: Date.now() - startTime,
    };
  }

  private record(result: FlowResult): FlowResult {
    this.counts[result.status] += 1;
    return result;
  }
}

// ============================================================================
// SCHEDULED SWEEPS
// ============================================================================

export const SweepArgsSchema = z.object({
  entity_type: z.enum(KNOWN_ENTITY_TYPES),
  limit: z.number().int().positive().default(50),
});

export type SweepArgs = z.infer<typeof SweepArgsSchema>;

export function sweepTaskId(entityType: KnownEntityType): string {
  return `sweep:${entityType}`;
}

/**
 * Scheduler task that validates its bound args, then sweeps
 */
export function sweepTask(flow: AbmCrmFlow): TaskFn {
  return async args => {
    const { entity_type: entityType, limit } = SweepArgsSchema.parse(args);
    await flow.sweep({ entityType, limit });
  };
}

export interface RegisterSweepsOptions {
  entityTypes: readonly string[];
  intervalSeconds: number;
  limit: number;
}

/**
 * One sweep task per configured entity type. Returns the ids that were added.
 */
export function registerSweeps(scheduler: Scheduler, flow: AbmCrmFlow, options: RegisterSweepsOptions): string[] {
  const added: string[] = [];
  const task = sweepTask(flow);

  for (const name of options.entityTypes) {
    const parsed = SweepArgsSchema.safeParse({ entity_type: name, limit: options.limit });
    if (!parsed.success) {
      console.warn(`[flow] Skipping sweep for unsupported entity type: ${name}`);
      continue;
    }

    const taskId = sweepTaskId(parsed.data.entity_type);
    if (scheduler.addTask(taskId, task, options.intervalSeconds, parsed.data)) {
      added.push(taskId);
    }
  }

  return added;
}
