import { EntityProperties, KnownEntityType, isPlainObject } from "../types/entities";
import { ScoreResult } from "../types/scoring";

/**
 * HubSpot object as returned by the CRM API.
 * v3 nests properties as plain values, legacy v1 payloads wrap each one in `{ value }`.
 */
export interface HubSpotObject {
  id?: unknown;
  properties?: unknown;
  [key: string]: unknown;
}

const OBJECT_PATHS: Record<KnownEntityType, string> = {
  company: "companies",
  contact: "contacts",
  deal: "deals",
};

/** Default properties requested for each object type */
export const HUBSPOT_PROPERTIES: Record<KnownEntityType, string[]> = {
  company: ["name", "industry", "domain", "website", "numberofemployees", "annualrevenue", "description"],
  contact: ["firstname", "lastname", "email", "jobtitle", "associatedcompanyid", "lifecyclestage"],
  deal: ["dealname", "amount", "dealstage", "pipeline", "closedate"],
};

export function hubSpotObjectPath(entityType: KnownEntityType): string {
  return OBJECT_PATHS[entityType];
}

/**
 * Flatten a HubSpot object into a plain property bag with its id.
 * Top-level fields win over nested properties; `null` values are dropped.
 */
export function flattenHubSpotObject(payload: HubSpotObject): EntityProperties {
  const flat: EntityProperties = {};

  const properties = isPlainObject(payload.properties) ? payload.properties : {};
  for (const [key, raw] of Object.entries(properties)) {
    const value = isPlainObject(raw) && "value" in raw ? raw.value : raw;
    if (value !== null && value !== undefined) {
      flat[key] = value;
    }
  }

  for (const [key, value] of Object.entries(payload)) {
    if (key === "properties" || key === "vid" || value === null || value === undefined) continue;
    flat[key] = value;
  }

  const id = payload.id ?? payload.vid;
  if (typeof id === "string" || typeof id === "number") {
    flat.id = String(id);
  }

  return flat;
}

export function extractDomainFromUrl(url: string): string {
  try {
    const parsed = new URL(url.startsWith("http") ? url : `https://${url}`);
    return parsed.hostname.replace(/^www\./, "");
  } catch {
    return url.replace(/^(https?:\/\/)?(www\.)?/, "").split("/")[0];
  }
}

/**
 * CRM properties for a written-back score: 0-100 integer plus when it was computed
 */
export function scoreProperties(score: ScoreResult): Record<string, string> {
  return {
    abm_score: String(Math.round(score.total_score * 100)),
    score_updated_at: score.scored_at,
  };
}
