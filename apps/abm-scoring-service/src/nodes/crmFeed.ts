import { Node, NodeData } from "../pipeline/node";
import { CacheManager } from "../cache/cacheManager";
import { CrmClient } from "../services/crmClient";
import { extractDomainFromUrl } from "../mappers/hubspot";
import { Entity, EntityProperties, EntityType, identityType, parseEntity } from "../types/entities";
import { IntegrationError, describeError, errorMessage } from "../utils/errors";
import { toSerializable } from "../utils/serialize";

export const DEFAULT_PROMPT_TEMPLATE = "Generate a CRM record based on this data: {data}";

/** Fields an entity needs before it is worth scoring */
export const REQUIRED_FIELDS: Record<EntityType, string[]> = {
  company: ["name", "industry"],
  contact: ["firstname", "lastname"],
  deal: ["dealname", "amount"],
  unknown: [],
};

// Never taken from the CRM copy
const IDENTITY_FIELDS = new Set(["id", "entity_type", "declared_type"]);

export type EnrichmentSource = "payload" | "cache" | "crm";

export interface EnrichmentReport {
  source: EnrichmentSource;
  filled_fields: string[];
  /** Required fields still empty after enrichment */
  missing_fields: string[];
  degraded: boolean;
  error?: string;
}

export function isEnrichmentReport(value: unknown): value is EnrichmentReport {
  if (typeof value !== "object" || value === null) return false;
  return "source" in value && "degraded" in value && typeof value.degraded === "boolean";
}

export type CrmFeedOutput = {
  entity: Entity;
  prompt: string;
  enrichment: EnrichmentReport;
};

export interface CrmFeedOptions {
  crm?: CrmClient | null;
  promptTemplate?: string;
}

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

export function missingFields(entity: Entity): string[] {
  const record: EntityProperties = entity;
  return REQUIRED_FIELDS[entity.entity_type].filter(field => isEmpty(record[field]));
}

export function renderPrompt(template: string, entity: Entity): string {
  return template.split("{data}").join(JSON.stringify(toSerializable(entity, []), null, 2));
}

/**
 * Entry node: completes a webhook entity from the CRM and renders its scoring prompt.
 * CRM failures degrade the run instead of failing it.
 */
export class CrmFeedNode extends Node<CrmFeedOutput> {
  private readonly crm: CrmClient | null;
  private readonly promptTemplate: string;

  constructor(private readonly cache: CacheManager, options: CrmFeedOptions = {}) {
    super({
      name: "CrmFeedNode",
      description: `
        Completes CRM entities from the CRM of record and renders their scoring prompt.
        Fetched records and prompts are cached.
      `,
      inputs: ["entity"],
      outputs: ["entity", "prompt", "enrichment"],
    });
    this.crm = options.crm ?? null;
    this.promptTemplate = options.promptTemplate ?? DEFAULT_PROMPT_TEMPLATE;
  }

  async run(inputs: NodeData): Promise<CrmFeedOutput> {
    const received = parseEntity(inputs.entity);
    const enrichment: EnrichmentReport = {
      source: "payload",
      filled_fields: [],
      missing_fields: missingFields(received),
      degraded: false,
    };

    let entity = received;
    if (enrichment.missing_fields.length > 0 && received.entity_type !== "unknown") {
      const fetched = await this.lookup(received, enrichment);
      if (fetched) {
        entity = this.fillGaps(received, fetched, enrichment);
      }
    }

    entity = withDomain(entity, enrichment);
    enrichment.missing_fields = missingFields(entity);

    return {
      entity,
      prompt: this.prompt(entity),
      enrichment,
    };
  }

  /**
   * Entity cache first, then the CRM. Returns null when neither has the record.
   */
  private async lookup(entity: Entity, enrichment: EnrichmentReport): Promise<EntityProperties | null> {
    const cached = this.cache.getEntity(entity.id, entity.entity_type);
    if (cached) {
      enrichment.source = "cache";
      return cached;
    }

    if (!this.crm || entity.entity_type === "unknown") {
      return null;
    }

    try {
      const fetched = await this.crm.fetchEntity(entity.entity_type, entity.id);
      this.cache.cacheEntity(entity.id, entity.entity_type, fetched);
      enrichment.source = "crm";
      return fetched;
    } catch (error) {
      const failure =
        error instanceof IntegrationError
          ? error
          : new IntegrationError(`CRM fetch failed: ${errorMessage(error)}`);
      const report = describeError(failure, {
        node: this.name,
        entity_id: entity.id,
        entity_type: entity.entity_type,
        crm: this.crm.name,
      });
      console.error(`[crmFeed] ${report.message}, continuing with payload data`, report.context);
      enrichment.degraded = true;
      enrichment.error = report.message;
      return null;
    }
  }

  /**
   * Copy fetched values into fields the payload left empty; payload values always win
   */
  private fillGaps(entity: Entity, fetched: EntityProperties, enrichment: EnrichmentReport): Entity {
    const current: EntityProperties = entity;
    const merged: EntityProperties = { ...entity };
    const filled: string[] = [];

    for (const [key, value] of Object.entries(fetched)) {
      if (IDENTITY_FIELDS.has(key) || isEmpty(value) || !isEmpty(current[key])) continue;
      merged[key] = value;
      filled.push(key);
    }

    try {
      const completed = parseEntity(merged);
      enrichment.filled_fields = filled;
      return completed;
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[crmFeed] Ignoring CRM data for ${entity.entity_type} ${entity.id}: ${message}`);
      enrichment.degraded = true;
      enrichment.error = message;
      return entity;
    }
  }

  private prompt(entity: Entity): string {
    const cached = this.cache.getPrompt(entity.id, identityType(entity));
    if (cached) return cached;

    const prompt = renderPrompt(this.promptTemplate, entity);
    this.cache.cachePrompt(entity.id, identityType(entity), prompt);
    return prompt;
  }
}

/** Companies without a domain take it from their website */
function withDomain(entity: Entity, enrichment: EnrichmentReport): Entity {
  if (entity.entity_type !== "company" || !isEmpty(entity.domain) || typeof entity.website !== "string" || isEmpty(entity.website)) {
    return entity;
  }
  enrichment.filled_fields = [...enrichment.filled_fields, "domain"];
  return { ...entity, domain: extractDomainFromUrl(entity.website) };
}
