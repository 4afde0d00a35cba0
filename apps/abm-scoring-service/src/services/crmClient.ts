import { z } from "zod";
import { config } from "../config";
import { EntityProperties, KnownEntityType } from "../types/entities";
import { ScoreResult } from "../types/scoring";
import { IntegrationError, errorMessage } from "../utils/errors";
import { HUBSPOT_PROPERTIES, flattenHubSpotObject, hubSpotObjectPath, scoreProperties } from "../mappers/hubspot";

/**
 * Access to the CRM of record: reads, plus writing scores back
 */
export interface CrmClient {
  readonly name: string;
  fetchEntity(entityType: KnownEntityType, entityId: string): Promise<EntityProperties>;
  listEntities(entityType: KnownEntityType, limit: number): Promise<EntityProperties[]>;
  updateScore(entityType: KnownEntityType, entityId: string, score: ScoreResult): Promise<void>;
}

export interface HubSpotClientOptions {
  accessToken: string;
  baseUrl?: string;
}

const hubSpotObjectSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

const hubSpotListSchema = z.object({
  results: z.array(hubSpotObjectSchema),
});

// HubSpot caps list pages at 100
const MAX_PAGE_SIZE = 100;

/**
 * HubSpot CRM v3 objects API over fetch
 */
export class HubSpotClient implements CrmClient {
  readonly name = "hubspot";
  private readonly accessToken: string;
  private readonly baseUrl: string;

  constructor(options: HubSpotClientOptions) {
    this.accessToken = options.accessToken;
    this.baseUrl = (options.baseUrl ?? "https://api.hubapi.com").replace(/\/+$/, "");
  }

  async fetchEntity(entityType: KnownEntityType, entityId: string): Promise<EntityProperties> {
    const path = `/crm/v3/objects/${hubSpotObjectPath(entityType)}/${encodeURIComponent(entityId)}`;
    const body = await this.request(path, { properties: HUBSPOT_PROPERTIES[entityType].join(",") });

    const parsed = hubSpotObjectSchema.safeParse(body);
    if (!parsed.success) {
      throw new IntegrationError(`Unexpected HubSpot response for ${entityType} ${entityId}`, {
        entity_type: entityType,
        entity_id: entityId,
      });
    }
    return flattenHubSpotObject(parsed.data);
  }

  async listEntities(entityType: KnownEntityType, limit: number): Promise<EntityProperties[]> {
    const path = `/crm/v3/objects/${hubSpotObjectPath(entityType)}`;
    const body = await this.request(path, {
      limit: String(Math.max(1, Math.min(limit, MAX_PAGE_SIZE))),
      properties: HUBSPOT_PROPERTIES[entityType].join(","),
    });

    const parsed = hubSpotListSchema.safeParse(body);
    if (!parsed.success) {
      throw new IntegrationError(`Unexpected HubSpot list response for ${entityType}`, {
        entity_type: entityType,
      });
    }
    return parsed.data.results.map(obj => flattenHubSpotObject(obj));
  }

  /**
   * PATCH the score properties onto the CRM record
   */
  async updateScore(entityType: KnownEntityType, entityId: string, score: ScoreResult): Promise<void> {
    const path = `/crm/v3/objects/${hubSpotObjectPath(entityType)}/${encodeURIComponent(entityId)}`;
    await this.request(path, {}, { method: "PATCH", body: { properties: scoreProperties(score) } });
    console.log(`[crm] Wrote score ${score.total_score} to ${entityType} ${entityId}`);
  }

  private async request(
    path: string,
    query: Record<string, string>,
    options: { method?: "GET" | "PATCH"; body?: unknown } = {}
  ): Promise<unknown> {
    const search = new URLSearchParams(query).toString();
    const url = search ? `${this.baseUrl}${path}?${search}` : `${this.baseUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? "GET",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.accessToken}`,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      });
    } catch (error) {
      throw new IntegrationError(`HubSpot request failed: ${errorMessage(error)}`, { path });
    }

    if (!response.ok) {
      throw new IntegrationError(`HubSpot request failed: ${response.status} ${response.statusText}`, {
        path,
        status: response.status,
      });
    }

    return response.json();
  }
}

/**
 * Build the CRM client from config. Returns null when no token is configured.
 */
export function createCrmClient(): CrmClient | null {
  if (!config.hubspotAccessToken) {
    console.warn("[crm] HUBSPOT_ACCESS_TOKEN not set, CRM lookups disabled");
    return null;
  }
  return new HubSpotClient({
    accessToken: config.hubspotAccessToken,
    baseUrl: config.hubspotBaseUrl,
  });
}
