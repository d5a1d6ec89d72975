import type { ChunkMetadata, MetadataFilter } from "../corpus/types.js";

export type SearchResult = {
  chunk_id: string;
  content: string;
  metadata: ChunkMetadata;
  /** Raw dense-retrieval distance, lower is closer. */
  distance: number;
  /** Always `1 - distance`; negative when the distance exceeds 1. */
  similarity_score: number;
  recency_score?: number;
  quality_score?: number;
  combined_score?: number;
  lexical_score?: number;
  hybrid_score?: number;
};

export type LexicalMatch = {
  chunk_id: string;
  score: number;
};

export type SearchOptions = {
  limit?: number;
  filter?: MetadataFilter;
  requestId?: string;
};

export type HybridSearchOptions = SearchOptions & {
  semanticWeight?: number;
  lexicalWeight?: number;
};

export type RecencySearchOptions = SearchOptions & {
  recencyWeight?: number;
};

export type QualitySearchOptions = SearchOptions & {
  qualityWeight?: number;
};

export type WeightedSearchOptions = SearchOptions & {
  recencyWeight?: number;
  qualityWeight?: number;
  applyTagBoosts?: boolean;
};

export type SearcherStats = {
  collection: string;
  total_chunks: number;
  lexical_documents: number;
};
