import { CrmFeedNode, renderPrompt, missingFields } from "../crmFeed";
import { CacheManager } from "../../cache/cacheManager";
import { CrmClient } from "../../services/crmClient";
import { EntityProperties, KnownEntityType, parseEntity } from "../../types/entities";
import { IntegrationError } from "../../utils/errors";

class FakeCrm implements CrmClient {
  readonly name = "fake";
  readonly fetched: string[] = [];

  constructor(private readonly records: Record<string, EntityProperties>, private readonly failure?: Error) {}

  async fetchEntity(entityType: KnownEntityType, entityId: string): Promise<EntityProperties> {
    this.fetched.push(`${entityType}:${entityId}`);
    if (this.failure) throw this.failure;
    const record = this.records[entityId];
    if (!record) throw new IntegrationError(`No ${entityType} ${entityId}`);
    return record;
  }

  async listEntities(): Promise<EntityProperties[]> {
    return Object.values(this.records);
  }

  async updateScore(): Promise<void> {
    return undefined;
  }
}

describe("CrmFeedNode", () => {
  let cache: CacheManager;

  beforeEach(() => {
    cache = new CacheManager();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should pass complete entities through without a CRM call", async () => {
    const crm = new FakeCrm({});
    const node = new CrmFeedNode(cache, { crm });
    const entity = parseEntity({ id: "c-1", type: "company", name: "Acme", industry: "Software" });

    const output = await node.run({ entity });

    expect(crm.fetched).toEqual([]);
    expect(output.entity).toEqual(entity);
    expect(output.enrichment).toEqual({ source: "payload", filled_fields: [], missing_fields: [], degraded: false });
  });

  it("should fill gaps from the CRM while payload values win", async () => {
    const crm = new FakeCrm({
      "c-2": { id: "c-2", name: "Acme Holdings", industry: "Software", domain: "acme.io" },
    });
    const node = new CrmFeedNode(cache, { crm });
    const entity = parseEntity({ id: "c-2", type: "company", name: "Acme" });

    const output = await node.run({ entity });

    expect(output.entity).toMatchObject({ id: "c-2", name: "Acme", industry: "Software", domain: "acme.io" });
    expect(output.enrichment).toEqual({
      source: "crm",
      filled_fields: ["industry", "domain"],
      missing_fields: [],
      degraded: false,
    });
    expect(entity).not.toHaveProperty("industry");
  });

  it("should serve repeated lookups from the entity cache", async () => {
    const crm = new FakeCrm({ "c-3": { id: "c-3", name: "Acme", industry: "Software" } });
    const entity = parseEntity({ id: "c-3", type: "company" });

    await new CrmFeedNode(cache, { crm }).run({ entity });
    const second = await new CrmFeedNode(cache, { crm }).run({ entity });

    expect(crm.fetched).toEqual(["company:c-3"]);
    expect(second.enrichment.source).toBe("cache");
  });

  it("should continue with payload data when the CRM fails", async () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const crm = new FakeCrm({}, new IntegrationError("HubSpot request failed: 503 Service Unavailable"));
    const node = new CrmFeedNode(cache, { crm });
    const entity = parseEntity({ id: "c-4", type: "company", name: "Acme" });

    const output = await node.run({ entity });

    expect(output.entity).toEqual(entity);
    expect(output.enrichment).toEqual({
      source: "payload",
      filled_fields: [],
      missing_fields: ["industry"],
      degraded: true,
      error: "HubSpot request failed: 503 Service Unavailable",
    });
    expect(error).toHaveBeenCalledTimes(1);
    expect(cache.getEntity("c-4", "company")).toBeUndefined();
  });

  it("should report missing fields when no CRM is configured", async () => {
    const node = new CrmFeedNode(cache);
    const output = await node.run({ entity: parseEntity({ id: "p-1", type: "contact", firstname: "Ada" }) });

    expect(output.enrichment.missing_fields).toEqual(["lastname"]);
    expect(output.enrichment.degraded).toBe(false);
  });

  it("should derive a company domain from its website", async () => {
    const node = new CrmFeedNode(cache);
    const entity = parseEntity({
      id: "c-5",
      type: "company",
      name: "Acme",
      industry: "Software",
      website: "https://www.acme.io/about",
    });

    const output = await node.run({ entity });

    expect(output.entity).toMatchObject({ domain: "acme.io" });
    expect(output.enrichment.filled_fields).toEqual(["domain"]);
  });

  it("should render and cache the prompt", async () => {
    const node = new CrmFeedNode(cache, { promptTemplate: "Score this: {data}" });
    const entity = parseEntity({ id: "d-1", type: "deal", dealname: "Renewal", amount: 1000 });

    const { prompt } = await node.run({ entity });

    expect(prompt).toBe(`Score this: ${JSON.stringify(entity, null, 2)}`);
    expect(cache.getPrompt("d-1", "deal")).toBe(prompt);
  });

  describe("helpers", () => {
    it("should treat blank strings as missing", () => {
      expect(missingFields(parseEntity({ id: "d-2", type: "deal", dealname: " ", amount: 0 }))).toEqual(["dealname"]);
    });

    it("should render values JSON cannot hold", () => {
      const entity = parseEntity({ id: "c-6", type: "company", revenue: BigInt(10) });
      expect(renderPrompt("{data}", entity)).toContain('"revenue": "10"');
    });
  });
});
