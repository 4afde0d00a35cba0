import { SupabaseClient } from "@supabase/supabase-js";
import { getSupabase } from "./supabase";
import { PersistenceError } from "../utils/errors";

/**
 * Document store
 * Uses Supabase when configured, otherwise an in-memory map (dev/testing)
 */

export type Document = Record<string, unknown>;

export interface DocumentStore {
  readonly backend: string;
  upsert(collection: string, id: string, document: Document): Promise<void>;
  get(collection: string, id: string): Promise<Document | null>;
}

export class InMemoryDocumentStore implements DocumentStore {
  readonly backend = "memory";
  private readonly collections = new Map<string, Map<string, Document>>();

  async upsert(collection: string, id: string, document: Document): Promise<void> {
    let records = this.collections.get(collection);
    if (!records) {
      records = new Map();
      this.collections.set(collection, records);
    }
    records.set(id, document);
  }

  async get(collection: string, id: string): Promise<Document | null> {
    return this.collections.get(collection)?.get(id) ?? null;
  }

  /** Number of documents in a collection */
  count(collection: string): number {
    return this.collections.get(collection)?.size ?? 0;
  }
}

/**
 * One table per collection: (id text primary key, entity_type text, document jsonb, updated_at timestamptz)
 */
export class SupabaseDocumentStore implements DocumentStore {
  readonly backend = "supabase";

  constructor(private readonly supabase: SupabaseClient) {}

  async upsert(collection: string, id: string, document: Document): Promise<void> {
    const { error } = await this.supabase.from(collection).upsert(
      {
        id,
        entity_type: document.entity_type ?? null,
        document,
        updated_at: new Date().toISOString(),
      },
      { onConflict: "id", ignoreDuplicates: false }
    );

    if (error) {
      console.error(`[db] Upsert into ${collection} failed:`, error.message);
      throw new PersistenceError(`Failed to upsert ${collection}/${id}: ${error.message}`, {
        collection,
        entity_id: id,
      });
    }
  }

  async get(collection: string, id: string): Promise<Document | null> {
    const { data, error } = await this.supabase
      .from(collection)
      .select("document")
      .eq("id", id)
      .maybeSingle();

    if (error) {
      throw new PersistenceError(`Failed to read ${collection}/${id}: ${error.message}`, {
        collection,
        entity_id: id,
      });
    }

    const document: unknown = data?.document;
    return typeof document === "object" && document !== null && !Array.isArray(document)
      ? { ...document }
      : null;
  }
}

export function createDocumentStore(): DocumentStore {
  const supabase = getSupabase();
  if (!supabase) {
    console.warn("[db] Supabase not configured, using in-memory document store");
    return new InMemoryDocumentStore();
  }
  return new SupabaseDocumentStore(supabase);
}
