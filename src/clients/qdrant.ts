import { QdrantClient } from "@qdrant/js-client-rest";
import type { Config } from "../config/index.js";
import { isQualityRating, type Chunk, type ChunkMetadata } from "../modules/corpus/types.js";
import type { StoreFilter, VectorMatch, VectorStore } from "../modules/search/ports.js";
import { logInfo } from "../observability/logger.js";
import { createLocalVectorStoreClient } from "./local-vector-store.js";

const REQUEST_TIMEOUT_MS = 5000;
const SCROLL_PAGE_SIZE = 256;

type PointId = string | number;

export type MatchClause = {
  key: string;
  match: { value: string };
};

export type PointFilter = {
  must: MatchClause[];
};

export type ScoredPoint = {
  id: PointId;
  score: number;
  payload?: Record<string, unknown> | null;
};

export type StoredPoint = {
  id: PointId;
  payload?: Record<string, unknown> | null;
};

/**
 * The collection operations the engine needs. `QdrantClient` satisfies it,
 * and so does the file-backed store used in local mode.
 */
export interface CollectionClient {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  count(collection: string, request?: { exact?: boolean }): Promise<{ count: number }>;
  search(
    collection: string,
    request: {
      vector: number[];
      limit?: number;
      filter?: PointFilter;
      with_payload?: boolean;
      with_vector?: boolean;
    }
  ): Promise<ScoredPoint[]>;
  scroll(
    collection: string,
    request?: {
      limit?: number;
      offset?: PointId;
      with_payload?: boolean;
      with_vector?: boolean;
    }
  ): Promise<{ points: StoredPoint[]; next_page_offset?: unknown }>;
}

export const buildPointFilter = (filter: StoreFilter | undefined): PointFilter | undefined => {
  if (!filter) {
    return undefined;
  }
  const must: MatchClause[] = [];
  if (filter.quality_rating) {
    must.push({ key: "quality_rating", match: { value: filter.quality_rating } });
  }
  if (filter.format) {
    must.push({ key: "format", match: { value: filter.format } });
  }
  return must.length > 0 ? { must } : undefined;
};

const pickFirstString = (source: Record<string, unknown>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
};

const readTags = (value: unknown): string[] | undefined => {
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === "string");
  }
  if (typeof value === "string" && value.trim().length > 0) {
    return value.split(",").map((tag) => tag.trim()).filter(Boolean);
  }
  return undefined;
};

export const payloadToMetadata = (payload: Record<string, unknown>): ChunkMetadata => {
  const metadata: ChunkMetadata = { ...payload };
  delete metadata.content;
  delete metadata.text;
  const documentId = pickFirstString(payload, ["document_id", "doc_id"]);
  if (documentId) {
    metadata.document_id = documentId;
  }
  metadata.quality_rating = isQualityRating(payload.quality_rating) ? payload.quality_rating : undefined;
  metadata.tags = readTags(payload.tags);
  return metadata;
};

const resolveChunkId = (id: PointId, payload: Record<string, unknown>): string =>
  pickFirstString(payload, ["chunk_id"]) ?? String(id);

export const toVectorMatch = (point: ScoredPoint): VectorMatch | null => {
  const payload = point.payload ?? {};
  const content = pickFirstString(payload, ["content", "text"]);
  if (content === undefined) {
    return null;
  }
  return {
    chunk_id: resolveChunkId(point.id, payload),
    // Cosine collections report similarity; the engine works in distances.
    distance: 1.0 - point.score,
    content,
    metadata: payloadToMetadata(payload)
  };
};

const toChunk = (point: StoredPoint): Chunk | null => {
  const payload = point.payload ?? {};
  const content = pickFirstString(payload, ["content", "text"]);
  if (content === undefined) {
    return null;
  }
  const metadata = payloadToMetadata(payload);
  return {
    id: resolveChunkId(point.id, payload),
    content,
    document_id: metadata.document_id ?? "",
    metadata
  };
};

const isPointId = (value: unknown): value is PointId => typeof value === "string" || typeof value === "number";

export function createQdrantVectorStore(client: CollectionClient, collection: string): VectorStore {
  return {
    collection,

    async exists() {
      const { collections } = await client.getCollections();
      return collections.some((entry) => entry.name === collection);
    },

    async count() {
      const { count } = await client.count(collection, { exact: true });
      return count;
    },

    async query(embedding, options) {
      const points = await client.search(collection, {
        vector: embedding,
        limit: options.limit,
        filter: buildPointFilter(options.filter),
        with_payload: true,
        with_vector: false
      });
      return points.map(toVectorMatch).filter((match): match is VectorMatch => match !== null);
    },

    async listChunks() {
      const chunks: Chunk[] = [];
      let offset: PointId | undefined;
      do {
        const page = await client.scroll(collection, {
          limit: SCROLL_PAGE_SIZE,
          offset,
          with_payload: true,
          with_vector: false
        });
        for (const point of page.points) {
          const chunk = toChunk(point);
          if (chunk) {
            chunks.push(chunk);
          }
        }
        offset = isPointId(page.next_page_offset) ? page.next_page_offset : undefined;
      } while (offset !== undefined);
      return chunks;
    }
  };
}

/**
 * Local mode without QDRANT_URL reads a JSON file instead of a Qdrant server.
 */
export function createCollectionClient(config: Pick<Config, "APP_MODE" | "QDRANT_URL" | "QDRANT_API_KEY" | "LOCAL_VECTOR_STORE_FILE">): CollectionClient {
  if (!config.QDRANT_URL) {
    logInfo("clients.qdrant.initialized", {}, { backend: "local-file" });
    return createLocalVectorStoreClient({ filePath: config.LOCAL_VECTOR_STORE_FILE });
  }

  logInfo("clients.qdrant.initialized", {}, { backend: "qdrant", mode: config.APP_MODE });
  return new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });
}
