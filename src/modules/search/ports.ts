import type { Chunk, ChunkMetadata, MetadataFilter } from "../corpus/types.js";

export type Vector = number[];

/**
 * Embedding model boundary. Identical input yields identical vectors within
 * a session, and batches come back in input order.
 */
export interface EmbeddingClient {
  embed(texts: string[]): Promise<Vector[]>;
}

/** Filter fields the store can apply natively; tags are matched by the searcher. */
export type StoreFilter = Pick<MetadataFilter, "quality_rating" | "format">;

export type VectorMatch = {
  chunk_id: string;
  distance: number;
  content: string;
  metadata: ChunkMetadata;
};

export interface VectorStore {
  readonly collection: string;
  exists(): Promise<boolean>;
  count(): Promise<number>;
  query(embedding: Vector, options: { filter?: StoreFilter; limit: number }): Promise<VectorMatch[]>;
  listChunks(): Promise<Chunk[]>;
}
