import { QdrantClient } from "@qdrant/js-client-rest";
import { z } from "zod";
import type { MemoryRecord, MemorySearchResult } from "../../types.js";
import { ExternalServiceError, TimeoutFailure, toErrorMessage } from "../errors.js";
import type { Embedder, MemoryStore } from "../storage.js";

export interface QdrantStoreOptions {
  host: string;
  port: number;
  collectionName: string;
  dimensions: number;
  timeoutMs: number;
  embedder: Embedder;
}

const SCROLL_PAGE = 256;

const Payload = z.object({
  user_id: z.string(),
  text: z.string(),
  temporal_context: z.string().optional(),
  language: z.string(),
  source_excerpt: z.string().optional(),
  context: z.string().optional(),
  metadata: z.record(z.string()).default({}),
  created_at: z.string(),
});

type PointId = string | number;

function toPayload(record: MemoryRecord): z.input<typeof Payload> {
  return {
    user_id: record.userId,
    text: record.text,
    temporal_context: record.temporalContext,
    language: record.language,
    source_excerpt: record.sourceExcerpt,
    context: record.context,
    metadata: record.metadata,
    created_at: record.createdAt,
  };
}

function fromPoint(id: PointId, payload: unknown): MemoryRecord {
  const p = Payload.parse(payload);
  const record: MemoryRecord = {
    id: String(id),
    userId: p.user_id,
    text: p.text,
    language: p.language,
    metadata: p.metadata,
    createdAt: p.created_at,
  };
  if (p.temporal_context !== undefined) record.temporalContext = p.temporal_context;
  if (p.source_excerpt !== undefined) record.sourceExcerpt = p.source_excerpt;
  if (p.context !== undefined) record.context = p.context;
  return record;
}

function userFilter(userId: string) {
  return { must: [{ key: "user_id", match: { value: userId } }] };
}

/**
 * Qdrant-backed store. Each memory is one point whose vector is the
 * embedding of the fact text; the fact fields live in the payload.
 */
export class QdrantMemoryStore implements MemoryStore {
  readonly name = "qdrant";
  private client: QdrantClient;
  private options: QdrantStoreOptions;
  private ready: Promise<void> | null = null;

  constructor(options: QdrantStoreOptions) {
    this.options = options;
    this.client = new QdrantClient({
      host: options.host,
      port: options.port,
      timeout: options.timeoutMs,
      checkCompatibility: false,
    });
  }

  async add(record: MemoryRecord): Promise<void> {
    await this.ensureCollection();
    const vector = await this.options.embedder.embed(record.text);
    await this.call("upsert", () =>
      this.client.upsert(this.options.collectionName, {
        wait: true,
        points: [{ id: record.id, vector, payload: toPayload(record) }],
      })
    );
  }

  async search(query: string, userId: string, limit: number): Promise<MemorySearchResult[]> {
    await this.ensureCollection();
    const vector = await this.options.embedder.embed(query);
    const hits = await this.call("search", () =>
      this.client.search(this.options.collectionName, {
        vector,
        limit,
        filter: userFilter(userId),
        with_payload: true,
      })
    );
    return hits.map((hit) => ({ record: fromPoint(hit.id, hit.payload), score: hit.score }));
  }

  async getAll(userId: string): Promise<MemoryRecord[]> {
    await this.ensureCollection();
    const records: MemoryRecord[] = [];
    let offset: PointId | undefined;

    do {
      const page = await this.call("scroll", () =>
        this.client.scroll(this.options.collectionName, {
          filter: userFilter(userId),
          limit: SCROLL_PAGE,
          offset,
          with_payload: true,
          with_vector: false,
        })
      );
      for (const point of page.points) records.push(fromPoint(point.id, point.payload));
      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);

    return records.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async delete(id: string): Promise<boolean> {
    await this.ensureCollection();
    const existing = await this.call("retrieve", () =>
      this.client.retrieve(this.options.collectionName, { ids: [id], with_payload: false })
    );
    if (existing.length === 0) return false;
    await this.call("delete", () =>
      this.client.delete(this.options.collectionName, { wait: true, points: [id] })
    );
    return true;
  }

  async close(): Promise<void> {
    // the REST client holds no open resources
  }

  private ensureCollection(): Promise<void> {
    this.ready ??= this.createCollectionIfMissing().catch((err: unknown) => {
      this.ready = null;
      throw err;
    });
    return this.ready;
  }

  private async createCollectionIfMissing(): Promise<void> {
    const { collectionName, dimensions } = this.options;
    const { collections } = await this.call("getCollections", () => this.client.getCollections());
    if (collections.some((c) => c.name === collectionName)) return;

    await this.call("createCollection", () =>
      this.client.createCollection(collectionName, {
        vectors: { size: dimensions, distance: "Cosine" },
      })
    );
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new TimeoutFailure(`qdrant ${operation}`, this.options.timeoutMs, { cause: err });
      }
      throw new ExternalServiceError("qdrant", `${operation} failed: ${toErrorMessage(err)}`, { cause: err });
    }
  }
}
