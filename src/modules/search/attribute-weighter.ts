import type { QualityWeights, WeightingConfig } from "../../config/weighting.js";
import {
  DEFAULT_QUALITY_RATING,
  QUALITY_RATINGS,
  isQualityRating,
  type ChunkMetadata,
  type QualityRating
} from "../corpus/types.js";
import { clampUnit } from "./score-normalizer.js";
import type { SearchResult } from "./types.js";

const MS_PER_YEAR = 365 * 24 * 60 * 60 * 1000;

export const NEUTRAL_RECENCY_SCORE = 0.5;

export type RecencySignal =
  | { kind: "dated"; ageYears: number }
  | { kind: "unknown" };

export type AttributeWeights = {
  recencyWeight: number;
  qualityWeight: number;
};

export const resolveRecencySignal = (metadata: ChunkMetadata, now: Date): RecencySignal => {
  const raw = metadata.created_date;
  if (typeof raw !== "string" || raw.trim().length === 0) {
    return { kind: "unknown" };
  }
  const createdAt = Date.parse(raw);
  if (Number.isNaN(createdAt)) {
    return { kind: "unknown" };
  }
  return { kind: "dated", ageYears: (now.getTime() - createdAt) / MS_PER_YEAR };
};

export const scoreRecency = (signal: RecencySignal, decayRate: number): number => {
  switch (signal.kind) {
    case "unknown":
      return NEUTRAL_RECENCY_SCORE;
    case "dated":
      return clampUnit(Math.max(0.0, 1.0 - signal.ageYears * decayRate));
  }
};

export const resolveQualityRating = (metadata: ChunkMetadata): QualityRating =>
  isQualityRating(metadata.quality_rating) ? metadata.quality_rating : DEFAULT_QUALITY_RATING;

export const scoreQuality = (rating: QualityRating, weights: QualityWeights): number => {
  const maxWeight = Math.max(...QUALITY_RATINGS.map((tier) => weights[tier]));
  if (!(maxWeight > 0)) {
    return 0;
  }
  return clampUnit(weights[rating] / maxWeight);
};

/**
 * Similarity receives whatever weight recency and quality leave over. When
 * those two sum past 1 the remainder goes negative and similarity counts
 * against a result.
 */
export const combineScores = (
  scores: { similarity: number; recency: number; quality: number },
  weights: AttributeWeights
): number =>
  (1 - weights.recencyWeight - weights.qualityWeight) * scores.similarity +
  weights.recencyWeight * scores.recency +
  weights.qualityWeight * scores.quality;

export const tagBoostFor = (metadata: ChunkMetadata, tagBoosts: Readonly<Record<string, number>>): number => {
  const tags = Array.isArray(metadata.tags) ? metadata.tags : [];
  let boost: number | undefined;
  for (const tag of tags) {
    const value = tagBoosts[tag.trim().toLowerCase()];
    if (value !== undefined && (boost === undefined || value > boost)) {
      boost = value;
    }
  }
  return boost ?? 1.0;
};

const rankByCombinedScore = (results: SearchResult[], limit: number): SearchResult[] =>
  results
    .sort((left, right) => (right.combined_score ?? 0) - (left.combined_score ?? 0))
    .slice(0, Math.max(0, limit));

export const applyRecencyWeights = (
  results: readonly SearchResult[],
  recencyWeight: number,
  limit: number,
  options: { now: Date; decayRate: number }
): SearchResult[] =>
  rankByCombinedScore(
    results.map((result) => {
      const recency = scoreRecency(resolveRecencySignal(result.metadata, options.now), options.decayRate);
      return {
        ...result,
        recency_score: recency,
        combined_score: (1 - recencyWeight) * result.similarity_score + recencyWeight * recency
      };
    }),
    limit
  );

export const applyQualityWeights = (
  results: readonly SearchResult[],
  qualityWeight: number,
  limit: number,
  options: { qualityWeights: QualityWeights }
): SearchResult[] =>
  rankByCombinedScore(
    results.map((result) => {
      const quality = scoreQuality(resolveQualityRating(result.metadata), options.qualityWeights);
      return {
        ...result,
        quality_score: quality,
        combined_score: (1 - qualityWeight) * result.similarity_score + qualityWeight * quality
      };
    }),
    limit
  );

export const applyCombinedWeights = (
  results: readonly SearchResult[],
  weights: AttributeWeights,
  limit: number,
  options: { now: Date; config: WeightingConfig; applyTagBoosts?: boolean }
): SearchResult[] =>
  rankByCombinedScore(
    results.map((result) => {
      const recency = scoreRecency(resolveRecencySignal(result.metadata, options.now), options.config.recencyDecay);
      const quality = scoreQuality(resolveQualityRating(result.metadata), options.config.qualityWeights);
      const combined = combineScores({ similarity: result.similarity_score, recency, quality }, weights);
      return {
        ...result,
        recency_score: recency,
        quality_score: quality,
        // Boosts apply to positive scores only.
        combined_score:
          options.applyTagBoosts && combined > 0
            ? combined * tagBoostFor(result.metadata, options.config.tagBoosts)
            : combined
      };
    }),
    limit
  );
