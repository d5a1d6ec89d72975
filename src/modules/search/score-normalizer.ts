import type { ChunkMetadata } from "../corpus/types.js";
import type { LexicalMatch, SearchResult } from "./types.js";

export const toSimilarity = (distance: number): number => 1.0 - distance;

export const clampUnit = (value: number): number => Math.max(0, Math.min(1, value));

export const createSearchResult = (input: {
  chunk_id: string;
  content: string;
  metadata: ChunkMetadata;
  distance: number;
}): SearchResult => ({
  chunk_id: input.chunk_id,
  content: input.content,
  metadata: input.metadata,
  distance: input.distance,
  similarity_score: toSimilarity(input.distance)
});

/**
 * Scales raw lexical scores into [0, 1] by the batch maximum. An empty or
 * all-zero batch yields an empty map.
 */
export const normalizeLexicalScores = (matches: readonly LexicalMatch[]): Map<string, number> => {
  const normalized = new Map<string, number>();
  const maxScore = matches.reduce((max, match) => Math.max(max, match.score), 0);
  if (!(maxScore > 0)) {
    return normalized;
  }

  for (const match of matches) {
    const value = clampUnit(match.score / maxScore);
    normalized.set(match.chunk_id, Math.max(normalized.get(match.chunk_id) ?? 0, value));
  }
  return normalized;
};
