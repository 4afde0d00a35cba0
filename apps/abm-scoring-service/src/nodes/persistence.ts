import { Node, NodeData } from "../pipeline/node";
import { DocumentStore } from "../db/client";
import { EntityType, documentId, parseEntity } from "../types/entities";
import { FlowError, describeError } from "../utils/errors";
import { toSerializable } from "../utils/serialize";

export const COLLECTIONS: Record<EntityType, string> = {
  company: "companies",
  contact: "contacts",
  deal: "deals",
  unknown: "entities",
};

export type PersistenceResult =
  | { status: "success"; entity_id: string; entity_type: EntityType; collection: string }
  | {
      status: "partially_serialized";
      entity_id: string;
      entity_type: EntityType;
      collection: string;
      degraded_fields: string[];
    }
  | { status: "error"; error: string; error_type: string };

const PERSISTENCE_STATUSES: readonly string[] = ["success", "partially_serialized", "error"];

export function isPersistenceResult(value: unknown): value is PersistenceResult {
  if (typeof value !== "object" || value === null || !("status" in value)) return false;
  return typeof value.status === "string" && PERSISTENCE_STATUSES.includes(value.status);
}

export type PersistenceOutput = {
  result: PersistenceResult;
};

/**
 * Final node: upserts the entity with its scores into the collection for its type.
 * Never throws; failures come back as a result with status "error".
 */
export class PersistenceNode extends Node<PersistenceOutput> {
  constructor(private readonly store: DocumentStore) {
    super({
      name: "PersistenceNode",
      description: "Stores scored entities in the document store",
      inputs: ["entity", "scores"],
      outputs: ["result"],
    });
  }

  async run(inputs: NodeData): Promise<PersistenceOutput> {
    return { result: await this.persist(inputs) };
  }

  private async persist(inputs: NodeData): Promise<PersistenceResult> {
    try {
      const entity = parseEntity(inputs.entity);
      const collection = COLLECTIONS[entity.entity_type];
      const degraded: string[] = [];

      const document: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(entity)) {
        const converted = toSerializable(value, degraded, key);
        if (converted !== undefined) document[key] = converted;
      }
      document.scores = toSerializable(inputs.scores, degraded, "scores");
      document.updated_at = new Date().toISOString();

      const id = documentId(entity);
      await this.store.upsert(collection, id, document);

      const ref = { entity_id: entity.id, entity_type: entity.entity_type, collection };
      if (degraded.length > 0) {
        console.warn(`[persistence] Stored ${collection}/${id} with degraded fields`, {
          degraded_fields: degraded,
        });
        return { status: "partially_serialized", ...ref, degraded_fields: degraded };
      }

      console.log(`[persistence] Stored ${collection}/${id} (${this.store.backend})`);
      return { status: "success", ...ref };
    } catch (error) {
      const report = describeError(error, { node: this.name });
      console.error(`[persistence] ${report.message}`, report.context);
      return {
        status: "error",
        error: report.message,
        error_type: error instanceof FlowError ? report.error_type : "PersistenceError",
      };
    }
  }
}
