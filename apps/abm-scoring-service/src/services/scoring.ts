import { Entity, EntityProperties, KnownEntityType } from "../types/entities";
import { ScoreDimension, ScoreResult, WeightTable, WeightTables } from "../types/scoring";
import { ValidationError } from "../utils/errors";

export const SCORING_VERSION = "v1";

/** Score of an entity where no signal fired */
export const BASE_SCORE = 0.5;

// ============================================================================
// BASE SCORING WEIGHTS (adjustable at runtime via ScoringWeights)
// ============================================================================

export const DEFAULT_WEIGHTS: WeightTables = {
  company: {
    hiring: 0.1,
    funding: 0.1,
    industry_match: 0.2,
    domain_quality: 0.15,
    positive_news: 0.15,
    company_size: 0.1,
    growth_rate: 0.1,
    tech_adoption: 0.1,
  },
  contact: {
    title_c_level: 0.3,
    title_vp: 0.2,
    title_director: 0.15,
    title_manager: 0.1,
    meeting_engagement: 0.2,
    corporate_email: 0.1,
    company_association: 0.05,
    industry_match: 0.15,
  },
  deal: {
    deal_size_enterprise: 0.2,
    deal_size_mid: 0.1,
    late_stage: 0.15,
    company_association: 0.05,
    contact_association: 0.05,
  },
};

// ============================================================================
// SIGNAL VOCABULARY
// ============================================================================

const FREE_EMAIL_DOMAINS = [
  "gmail.com", "yahoo.com", "outlook.com", "hotmail.com",
  "icloud.com", "aol.com", "proton.me", "protonmail.com",
  "live.com", "msn.com", "ymail.com"
];

const TARGET_INDUSTRIES = [
  "technology", "software", "finance", "healthcare", "saas",
  "fintech", "biotech", "artificial intelligence", "machine learning",
  "computer software", "information technology"
];

const LATE_DEAL_STAGES = [
  "presentationscheduled", "decisionmakerboughtin", "contractsent", "closedwon"
];

const MIN_COMPANY_SIZE = 50;
const ENTERPRISE_DEAL_AMOUNT = 100_000;
const MID_DEAL_AMOUNT = 10_000;

export type Seniority = "C-Level" | "VP" | "Director" | "Manager" | "IC";

// ============================================================================
// VALUE HELPERS
// ============================================================================

/** HubSpot stores booleans as "true"/"false" strings */
export function isTruthy(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value > 0;
  if (typeof value === "string") {
    return ["true", "yes", "1", "y"].includes(value.trim().toLowerCase());
  }
  return false;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.replace(/[,$\s]/g, ""));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toText(value: unknown): string {
  return typeof value === "string" ? value.trim().toLowerCase() : "";
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.trim() !== "";
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

function extractDomain(value: string): string {
  return value
    .replace(/^(https?:\/\/)?(www\.)?/, "")
    .split("/")[0]
    .trim();
}

function hasKeyword(text: string, keywords: string[]): boolean {
  return keywords.some(k => new RegExp(`\\b${k}\\b`).test(text));
}

export function inferSeniorityFromTitle(title: string): Seniority {
  const titleLower = title.toLowerCase().replace(/vice[\s-]+president/g, "vp");

  const cSuiteKeywords = ["ceo", "cto", "cfo", "coo", "cmo", "chief", "founder", "owner", "president"];
  const vpKeywords = ["vp", "svp", "evp", "head of"];
  const directorKeywords = ["director"];
  const managerKeywords = ["manager", "lead"];

  if (hasKeyword(titleLower, cSuiteKeywords)) return "C-Level";
  if (hasKeyword(titleLower, vpKeywords)) return "VP";
  if (hasKeyword(titleLower, directorKeywords)) return "Director";
  if (hasKeyword(titleLower, managerKeywords)) return "Manager";

  return "IC";
}

function isTargetIndustry(value: unknown): boolean {
  const industry = toText(value).replace(/_/g, " ");
  return industry !== "" && TARGET_INDUSTRIES.some(i => industry.includes(i));
}

function contactSeniority(entity: EntityProperties): Seniority | null {
  const title = typeof entity.title === "string" ? entity.title : entity.jobtitle;
  return typeof title === "string" && title.trim() !== "" ? inferSeniorityFromTitle(title) : null;
}

// ============================================================================
// RULE TABLES
// ============================================================================

export interface SignalRule {
  signal: string;
  dimension: ScoreDimension;
  fires: (entity: EntityProperties) => boolean;
}

const COMPANY_RULES: SignalRule[] = [
  {
    signal: "hiring",
    dimension: "crm",
    fires: e => isTruthy(e.hiring) || isTruthy(e.has_open_jobs) || (toNumber(e.job_count) ?? 0) > 0,
  },
  {
    signal: "funding",
    dimension: "crm",
    fires: e => isTruthy(e.funding) || (toNumber(e.total_funding) ?? 0) > 0 || isPresent(e.recent_funding_round),
  },
  {
    signal: "industry_match",
    dimension: "industry",
    fires: e => isTargetIndustry(e.industry),
  },
  {
    signal: "domain_quality",
    dimension: "crm",
    fires: e => {
      const domain = extractDomain(toText(e.domain) || toText(e.website));
      return domain.includes(".") && !FREE_EMAIL_DOMAINS.includes(domain);
    },
  },
  {
    signal: "positive_news",
    dimension: "crm",
    fires: e => isTruthy(e.positive_news) || (toNumber(e.news_sentiment) ?? 0) > 0,
  },
  {
    signal: "company_size",
    dimension: "crm",
    fires: e => (toNumber(e.employee_count ?? e.numberofemployees) ?? 0) >= MIN_COMPANY_SIZE,
  },
  {
    signal: "growth_rate",
    dimension: "crm",
    fires: e => (toNumber(e.growth_rate) ?? 0) > 0,
  },
  {
    signal: "tech_adoption",
    dimension: "crm",
    fires: e => isTruthy(e.tech_adoption) || isPresent(e.tech_stack),
  },
];

const CONTACT_RULES: SignalRule[] = [
  { signal: "title_c_level", dimension: "crm", fires: e => contactSeniority(e) === "C-Level" },
  { signal: "title_vp", dimension: "crm", fires: e => contactSeniority(e) === "VP" },
  { signal: "title_director", dimension: "crm", fires: e => contactSeniority(e) === "Director" },
  { signal: "title_manager", dimension: "crm", fires: e => contactSeniority(e) === "Manager" },
  {
    signal: "meeting_engagement",
    dimension: "crm",
    fires: e => isTruthy(e.meeting_engagement) || (toNumber(e.num_meetings) ?? 0) > 0,
  },
  {
    signal: "corporate_email",
    dimension: "crm",
    fires: e => {
      const domain = toText(e.email).split("@")[1] ?? "";
      return domain !== "" && !FREE_EMAIL_DOMAINS.includes(domain);
    },
  },
  {
    signal: "company_association",
    dimension: "crm",
    fires: e => isPresent(e.company_id) || isPresent(e.associatedcompanyid),
  },
  {
    signal: "industry_match",
    dimension: "industry",
    fires: e => isTargetIndustry(e.industry),
  },
];

const DEAL_RULES: SignalRule[] = [
  {
    signal: "deal_size_enterprise",
    dimension: "crm",
    fires: e => (toNumber(e.amount) ?? 0) >= ENTERPRISE_DEAL_AMOUNT,
  },
  {
    signal: "deal_size_mid",
    dimension: "crm",
    fires: e => {
      const amount = toNumber(e.amount) ?? 0;
      return amount >= MID_DEAL_AMOUNT && amount < ENTERPRISE_DEAL_AMOUNT;
    },
  },
  {
    signal: "late_stage",
    dimension: "crm",
    fires: e => LATE_DEAL_STAGES.includes(toText(e.stage) || toText(e.dealstage)),
  },
  { signal: "company_association", dimension: "crm", fires: e => isPresent(e.company_id) },
  { signal: "contact_association", dimension: "crm", fires: e => isPresent(e.contact_id) },
];

export const RULES: Record<KnownEntityType, SignalRule[]> = {
  company: COMPANY_RULES,
  contact: CONTACT_RULES,
  deal: DEAL_RULES,
};

// ============================================================================
// SCORE COMPUTATION
// ============================================================================

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Apply one rule table to an entity.
 * The sum is capped to [0, 1]; callers check the result is still finite.
 */
export function computeScore(
  entity: Entity,
  scoringType: KnownEntityType,
  weights: WeightTable = DEFAULT_WEIGHTS[scoringType]
): ScoreResult {
  const signals: string[] = [];
  const contributions: Record<string, number> = {};
  let crmScore = 0;
  let industryScore = 0;

  for (const rule of RULES[scoringType]) {
    if (!rule.fires(entity)) continue;

    const weight = weights[rule.signal] ?? 0;
    signals.push(rule.signal);
    contributions[rule.signal] = weight;

    if (rule.dimension === "industry") {
      industryScore += weight;
    } else {
      crmScore += weight;
    }
  }

  const total = Math.max(0, Math.min(1, BASE_SCORE + crmScore + industryScore));

  return {
    crm_score: round(crmScore),
    industry_score: round(industryScore),
    total_score: round(total),
    base_score: BASE_SCORE,
    components: {
      signals,
      weights: contributions,
    },
    entity_id: entity.id,
    entity_type: scoringType,
    scoring_version: SCORING_VERSION,
    scored_at: new Date().toISOString(),
  };
}

// ============================================================================
// RUNTIME WEIGHTS
// ============================================================================

/**
 * Per-type weight tables that admins can tune.
 * Updates are re-normalized so each table keeps its default total.
 */
export class ScoringWeights {
  private tables: WeightTables = cloneTables(DEFAULT_WEIGHTS);

  get(entityType: KnownEntityType): WeightTable {
    return { ...this.tables[entityType] };
  }

  all(): WeightTables {
    return cloneTables(this.tables);
  }

  update(entityType: KnownEntityType, updates: Record<string, number>): WeightTable {
    for (const [signal, value] of Object.entries(updates)) {
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new ValidationError(`Weight for ${signal} must be between 0 and 1`, {
          entity_type: entityType,
          signal,
          value,
        });
      }
    }

    const next = { ...this.tables[entityType] };
    for (const [signal, value] of Object.entries(updates)) {
      if (signal in next) {
        next[signal] = value;
      } else {
        console.warn(`[scoring] Unknown weight factor for ${entityType}: ${signal}`);
      }
    }

    const targetSum = sum(DEFAULT_WEIGHTS[entityType]);
    const currentSum = sum(next);
    if (currentSum > 0) {
      for (const signal of Object.keys(next)) {
        next[signal] = round((next[signal] / currentSum) * targetSum);
      }
    }

    this.tables[entityType] = next;
    return { ...next };
  }

  reset(): WeightTables {
    this.tables = cloneTables(DEFAULT_WEIGHTS);
    return this.all();
  }
}

function sum(table: WeightTable): number {
  return Object.values(table).reduce((acc, w) => acc + w, 0);
}

function cloneTables(tables: WeightTables): WeightTables {
  return {
    company: { ...tables.company },
    contact: { ...tables.contact },
    deal: { ...tables.deal },
  };
}
