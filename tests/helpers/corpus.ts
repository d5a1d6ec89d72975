import { vi, type Mock } from "vitest";
import type { Chunk, ChunkMetadata } from "../../src/modules/corpus/types.js";
import type { EmbeddingClient, StoreFilter, Vector, VectorStore } from "../../src/modules/search/ports.js";
import { createSearchResult } from "../../src/modules/search/score-normalizer.js";
import type { SearchResult } from "../../src/modules/search/types.js";

export type StoredChunk = {
  chunk: Chunk;
  distance: number;
};

export const makeChunk = (id: string, content: string, metadata: ChunkMetadata = {}): Chunk => ({
  id,
  content,
  document_id: metadata.document_id ?? `doc-${id}`,
  metadata: { document_id: `doc-${id}`, ...metadata }
});

export const makeResult = (chunkId: string, distance: number, metadata: ChunkMetadata = {}, content = `content ${chunkId}`): SearchResult =>
  createSearchResult({ chunk_id: chunkId, content, metadata, distance });

/** Embeds every text as a fixed vector unless the table says otherwise. */
export const createFakeEmbeddingClient = (
  table: Record<string, Vector> = {}
): { client: EmbeddingClient; embed: Mock<(texts: string[]) => Promise<Vector[]>> } => {
  const embed = vi.fn(async (texts: string[]): Promise<Vector[]> => texts.map((text) => table[text] ?? [1, 0]));
  const client: EmbeddingClient = { embed };
  return { client, embed };
};

const matchesStoreFilter = (metadata: ChunkMetadata, filter: StoreFilter | undefined): boolean =>
  (!filter?.quality_rating || metadata.quality_rating === filter.quality_rating) &&
  (!filter?.format || metadata.format === filter.format);

/**
 * In-process stand-in for a vector collection. Each chunk carries a fixed
 * distance; matches come back in insertion order so callers must sort.
 */
export const createInMemoryVectorStore = (
  entries: StoredChunk[],
  options: { collection?: string; exists?: boolean } = {}
) => {
  const queries: Array<{ embedding: Vector; filter?: StoreFilter; limit: number }> = [];
  const store: VectorStore = {
    collection: options.collection ?? "test_corpus",
    async exists() {
      return options.exists ?? true;
    },
    async count() {
      return entries.length;
    },
    async query(embedding, queryOptions) {
      queries.push({ embedding, ...queryOptions });
      const ranked = entries
        .filter((entry) => matchesStoreFilter(entry.chunk.metadata, queryOptions.filter))
        .slice()
        .sort((left, right) => left.distance - right.distance)
        .slice(0, queryOptions.limit);
      return entries
        .filter((entry) => ranked.includes(entry))
        .map((entry) => ({
          chunk_id: entry.chunk.id,
          distance: entry.distance,
          content: entry.chunk.content,
          metadata: { ...entry.chunk.metadata }
        }));
    },
    async listChunks() {
      return entries.map((entry) => entry.chunk);
    }
  };
  return { store, queries };
};
