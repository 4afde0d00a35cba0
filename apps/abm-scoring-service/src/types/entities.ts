/**
 * CRM entity types
 * Each record is discriminated by `entity_type`; free-form CRM properties are kept as-is.
 */
import { z } from "zod";
import { ValidationError } from "../utils/errors";

// ============================================================================
// ENUMS
// ============================================================================

export const KNOWN_ENTITY_TYPES = ["company", "contact", "deal"] as const;

export type KnownEntityType = (typeof KNOWN_ENTITY_TYPES)[number];
export type EntityType = KnownEntityType | "unknown";

export function isKnownEntityType(value: unknown): value is KnownEntityType {
  return typeof value === "string" && (KNOWN_ENTITY_TYPES as readonly string[]).includes(value);
}

// ============================================================================
// SCHEMAS
// ============================================================================

const idSchema = z
  .union([z.string(), z.number()])
  .transform(value => String(value).trim())
  .pipe(z.string().min(1, "id must not be empty"));

// HubSpot sends numbers as strings, webhooks send them raw
const numberish = z.union([z.number(), z.string()]).nullish();
const text = z.string().nullish();

export const CompanySchema = z
  .object({
    entity_type: z.literal("company"),
    id: idSchema,
    name: text,
    industry: text,
    domain: text,
    website: text,
    employee_count: numberish,
  })
  .passthrough();

export const ContactSchema = z
  .object({
    entity_type: z.literal("contact"),
    id: idSchema,
    firstname: text,
    lastname: text,
    email: text,
    title: text,
    jobtitle: text,
    company_id: numberish,
  })
  .passthrough();

export const DealSchema = z
  .object({
    entity_type: z.literal("deal"),
    id: idSchema,
    dealname: text,
    amount: numberish,
    stage: text,
    dealstage: text,
    company_id: numberish,
    contact_id: numberish,
  })
  .passthrough();

export const UnknownEntitySchema = z
  .object({
    entity_type: z.literal("unknown"),
    id: idSchema,
    declared_type: z.string(),
  })
  .passthrough();

export const EntitySchema = z.discriminatedUnion("entity_type", [
  CompanySchema,
  ContactSchema,
  DealSchema,
  UnknownEntitySchema,
]);

export type Company = z.infer<typeof CompanySchema>;
export type Contact = z.infer<typeof ContactSchema>;
export type Deal = z.infer<typeof DealSchema>;
export type UnknownEntity = z.infer<typeof UnknownEntitySchema>;
export type Entity = z.infer<typeof EntitySchema>;

/** Loosely-typed CRM record as it arrives from a webhook or the CRM API */
export type EntityProperties = Record<string, unknown>;

// ============================================================================
// RESOLUTION
// ============================================================================

const PLURALS: Record<string, KnownEntityType> = {
  companies: "company",
  contacts: "contact",
  deals: "deal",
};

export interface ResolvedType {
  entityType: EntityType;
  /** Raw type string when it did not match a known type */
  declaredType?: string;
}

/**
 * Normalize a type hint ("Company", "contacts", "deal") to an entity type.
 * A missing hint resolves to company; an unrecognised one to unknown.
 */
export function resolveEntityType(hint: unknown): ResolvedType {
  if (typeof hint !== "string" || hint.trim() === "") {
    return { entityType: "company" };
  }

  const normalized = hint.trim().toLowerCase();
  if (isKnownEntityType(normalized)) return { entityType: normalized };
  if (normalized in PLURALS) return { entityType: PLURALS[normalized] };

  return { entityType: "unknown", declaredType: normalized };
}

export function isPlainObject(value: unknown): value is EntityProperties {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract id and type from a raw record without validating anything else
 */
export function entityRef(raw: EntityProperties): { entityId: string; entityType: EntityType } {
  const rawId = raw.id ?? raw.entity_id;
  const entityId =
    typeof rawId === "string" || typeof rawId === "number" ? String(rawId) : "unknown-id";
  const { entityType } = resolveEntityType(raw.entity_type ?? raw.type);
  return { entityId, entityType };
}

/**
 * Type half of an entity's cache identity.
 * Unknown entities are told apart by their declared type ("unknown:ticket").
 */
export function identityType(entity: Entity): string {
  return entity.entity_type === "unknown" ? `unknown:${entity.declared_type}` : entity.entity_type;
}

/** Document id in the store; unknown entities share one collection, so it carries the declared type */
export function documentId(entity: Entity): string {
  return entity.entity_type === "unknown" ? `${entity.declared_type}:${entity.id}` : entity.id;
}

/**
 * Validate a raw record into the Entity union
 */
export function parseEntity(raw: unknown): Entity {
  if (!isPlainObject(raw)) {
    throw new ValidationError("Entity must be an object", {
      received: raw === null ? "null" : Array.isArray(raw) ? "array" : typeof raw,
    });
  }

  const { entityType, declaredType } = resolveEntityType(raw.entity_type ?? raw.type);
  const candidate: EntityProperties = { ...raw, entity_type: entityType };
  if (entityType === "unknown") {
    // Already-parsed unknown entities keep their original declared type
    candidate.declared_type =
      raw.entity_type === "unknown" && typeof raw.declared_type === "string" ? raw.declared_type : declaredType;
  }
  if (candidate.id === undefined && raw.entity_id !== undefined) {
    candidate.id = raw.entity_id;
  }

  const parsed = EntitySchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid ${entityType} entity: ${issue.path.join(".") || "root"} ${issue.message}`, {
      entity_type: entityType,
      issues: parsed.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
    });
  }

  return parsed.data;
}
