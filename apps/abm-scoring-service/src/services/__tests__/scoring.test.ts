import {
  computeScore,
  inferSeniorityFromTitle,
  isTruthy,
  toNumber,
  ScoringWeights,
  DEFAULT_WEIGHTS,
  BASE_SCORE,
} from "../scoring";
import { parseEntity } from "../../types/entities";
import { ValidationError } from "../../utils/errors";

describe("Scoring Engine", () => {
  describe("computeScore (company)", () => {
    it("should return the base score when no signal fires", () => {
      const result = computeScore(parseEntity({ id: "c-1", type: "company" }), "company");

      expect(result.total_score).toBe(BASE_SCORE);
      expect(result.crm_score).toBe(0);
      expect(result.industry_score).toBe(0);
      expect(result.components.signals).toEqual([]);
      expect(result.entity_id).toBe("c-1");
      expect(result.entity_type).toBe("company");
    });

    it("should add hiring and funding to the CRM score", () => {
      const entity = parseEntity({ id: "c-2", type: "company", hiring: true, funding: "true" });
      const result = computeScore(entity, "company");

      expect(result.components.signals).toEqual(["hiring", "funding"]);
      expect(result.components.weights).toEqual({ hiring: 0.1, funding: 0.1 });
      expect(result.crm_score).toBeCloseTo(0.2, 4);
      expect(result.total_score).toBeCloseTo(0.7, 4);
    });

    it("should count a target industry in the industry score", () => {
      const entity = parseEntity({ id: "c-3", type: "company", industry: "COMPUTER_SOFTWARE" });
      const result = computeScore(entity, "company");

      expect(result.components.signals).toEqual(["industry_match"]);
      expect(result.industry_score).toBeCloseTo(0.2, 4);
      expect(result.crm_score).toBe(0);
      expect(result.total_score).toBeCloseTo(0.7, 4);
    });

    it("should not match industries that merely contain a short keyword", () => {
      const entity = parseEntity({ id: "c-4", type: "company", industry: "Retail" });
      expect(computeScore(entity, "company").components.signals).toEqual([]);
    });

    it("should cap the total score at 1", () => {
      const entity = parseEntity({
        id: "c-5",
        type: "company",
        hiring: true,
        funding: true,
        industry: "Technology",
        domain: "acme.io",
        positive_news: true,
        employee_count: 500,
        growth_rate: 0.3,
        tech_stack: ["react"],
      });
      const result = computeScore(entity, "company");

      expect(result.components.signals).toHaveLength(8);
      expect(result.crm_score).toBeCloseTo(0.8, 4);
      expect(result.industry_score).toBeCloseTo(0.2, 4);
      expect(result.total_score).toBe(1);
    });

    it("should ignore free email domains for domain quality", () => {
      const entity = parseEntity({ id: "c-6", type: "company", domain: "gmail.com" });
      expect(computeScore(entity, "company").components.signals).not.toContain("domain_quality");
    });

    it("should require at least 50 employees for company size", () => {
      const small = parseEntity({ id: "c-7", type: "company", employee_count: "49" });
      const large = parseEntity({ id: "c-8", type: "company", numberofemployees: "1,200" });

      expect(computeScore(small, "company").components.signals).toEqual([]);
      expect(computeScore(large, "company").components.signals).toEqual(["company_size"]);
    });
  });

  describe("computeScore (contact)", () => {
    it("should score title seniority and a corporate email", () => {
      const entity = parseEntity({
        id: "p-1",
        type: "contact",
        firstname: "Ada",
        lastname: "Lovelace",
        title: "Director of Engineering",
        email: "ada@acme.io",
      });
      const result = computeScore(entity, "contact");

      expect(result.components.signals).toEqual(["title_director", "corporate_email"]);
      expect(result.crm_score).toBeCloseTo(0.25, 4);
      expect(result.total_score).toBeCloseTo(0.75, 4);
    });

    it("should fall back to jobtitle and skip free email domains", () => {
      const entity = parseEntity({
        id: "p-2",
        type: "contact",
        jobtitle: "Vice President, Sales",
        email: "someone@gmail.com",
        num_meetings: 3,
      });
      const result = computeScore(entity, "contact");

      expect(result.components.signals).toEqual(["title_vp", "meeting_engagement"]);
      expect(result.total_score).toBeCloseTo(0.9, 4);
    });
  });

  describe("computeScore (deal)", () => {
    it("should score enterprise deals in a late stage", () => {
      const entity = parseEntity({ id: "d-1", type: "deal", amount: "$150,000", dealstage: "closedwon" });
      const result = computeScore(entity, "deal");

      expect(result.components.signals).toEqual(["deal_size_enterprise", "late_stage"]);
      expect(result.total_score).toBeCloseTo(0.85, 4);
    });

    it("should score mid-size deals with associations", () => {
      const entity = parseEntity({ id: "d-2", type: "deal", amount: 25000, company_id: "c-1", contact_id: 9 });
      const result = computeScore(entity, "deal");

      expect(result.components.signals).toEqual(["deal_size_mid", "company_association", "contact_association"]);
      expect(result.crm_score).toBeCloseTo(0.2, 4);
    });
  });

  describe("computeScore with custom weights", () => {
    it("should use the weights it is given", () => {
      const entity = parseEntity({ id: "c-9", type: "company", hiring: true });
      const result = computeScore(entity, "company", { ...DEFAULT_WEIGHTS.company, hiring: 0.4 });

      expect(result.crm_score).toBeCloseTo(0.4, 4);
      expect(result.total_score).toBeCloseTo(0.9, 4);
    });
  });

  describe("inferSeniorityFromTitle", () => {
    it.each([
      ["CTO", "C-Level"],
      ["Co-Founder", "C-Level"],
      ["Vice President of Sales", "VP"],
      ["Head of Growth", "VP"],
      ["Director of Sales", "Director"],
      ["Team Lead", "Manager"],
      ["Account Manager", "Manager"],
      ["Software Engineer", "IC"],
    ])("should map %s to %s", (title, expected) => {
      expect(inferSeniorityFromTitle(title)).toBe(expected);
    });
  });

  describe("value helpers", () => {
    it("should read HubSpot-style booleans", () => {
      expect(isTruthy("true")).toBe(true);
      expect(isTruthy("Yes")).toBe(true);
      expect(isTruthy("false")).toBe(false);
      expect(isTruthy(0)).toBe(false);
      expect(isTruthy(undefined)).toBe(false);
    });

    it("should parse formatted numbers", () => {
      expect(toNumber("$1,250")).toBe(1250);
      expect(toNumber("abc")).toBeUndefined();
      expect(toNumber(Infinity)).toBeUndefined();
    });
  });

  describe("ScoringWeights", () => {
    it("should start from the default tables", () => {
      const weights = new ScoringWeights();
      expect(weights.all()).toEqual(DEFAULT_WEIGHTS);
    });

    it("should return copies", () => {
      const weights = new ScoringWeights();
      const table = weights.get("company");
      table.hiring = 0.9;

      expect(weights.get("company").hiring).toBe(0.1);
    });

    it("should re-normalize a table after an update", () => {
      const weights = new ScoringWeights();
      const table = weights.update("company", { hiring: 0.3 });

      // 0.3 of a 1.2 total, scaled back to 1.0
      expect(table.hiring).toBeCloseTo(0.25, 4);
      expect(table.industry_match).toBeCloseTo(0.1667, 4);
      expect(Object.values(table).reduce((a, b) => a + b, 0)).toBeCloseTo(1, 3);
    });

    it("should reject weights outside 0..1", () => {
      const weights = new ScoringWeights();

      expect(() => weights.update("deal", { late_stage: 1.5 })).toThrow(ValidationError);
      expect(() => weights.update("deal", { late_stage: -0.1 })).toThrow(ValidationError);
      expect(weights.get("deal")).toEqual(DEFAULT_WEIGHTS.deal);
    });

    it("should ignore unknown factors with a warning", () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      const weights = new ScoringWeights();
      const table = weights.update("contact", { bogus: 0.5 });

      expect(table).not.toHaveProperty("bogus");
      expect(table.title_c_level).toBeCloseTo(0.3, 4);
      expect(warn).toHaveBeenCalledWith("[scoring] Unknown weight factor for contact: bogus");
      warn.mockRestore();
    });

    it("should reset every table", () => {
      const weights = new ScoringWeights();
      weights.update("company", { hiring: 0.5 });

      expect(weights.reset()).toEqual(DEFAULT_WEIGHTS);
    });
  });
});
