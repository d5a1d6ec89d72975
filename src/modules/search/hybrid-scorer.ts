import type { SearchResult } from "./types.js";

export type HybridWeights = {
  semanticWeight: number;
  lexicalWeight: number;
};

export const DEFAULT_HYBRID_WEIGHTS: HybridWeights = Object.freeze({
  semanticWeight: 0.7,
  lexicalWeight: 0.3
});

/**
 * Blends dense similarity with normalised lexical scores. When the lexical
 * map is absent or empty the hybrid score is the similarity itself. Weights
 * are used as given.
 */
export const fuseScores = (
  dense: readonly SearchResult[],
  lexical: ReadonlyMap<string, number> | undefined,
  weights: HybridWeights,
  limit: number
): SearchResult[] => {
  const hasLexical = lexical !== undefined && lexical.size > 0;
  const fused = dense.map((result): SearchResult => {
    if (!hasLexical) {
      return { ...result, hybrid_score: result.similarity_score };
    }
    const lexicalScore = lexical?.get(result.chunk_id) ?? 0.0;
    return {
      ...result,
      lexical_score: lexicalScore,
      hybrid_score: weights.semanticWeight * result.similarity_score + weights.lexicalWeight * lexicalScore
    };
  });

  return fused
    .sort((left, right) => (right.hybrid_score ?? 0) - (left.hybrid_score ?? 0))
    .slice(0, Math.max(0, limit));
};
