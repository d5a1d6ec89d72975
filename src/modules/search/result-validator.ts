import { logWarn } from "../../observability/logger.js";
import type { SearchResult } from "./types.js";

export interface ResultValidationOptions {
  similarityThreshold?: number;
  minKeywordMatches?: number;
  /** Results at or above this similarity skip the keyword check. */
  highSimilarityThreshold?: number;
  requestId?: string;
  logWarn?: typeof logWarn;
}

export type ResultValidation = {
  accepted: SearchResult[];
  warnings: string[];
};

const PREVIEW_LENGTH = 50;

const preview = (content: string): string => `${content.slice(0, PREVIEW_LENGTH)}...`;

export const countKeywordMatches = (content: string, keywords: readonly string[]): number => {
  const haystack = content.toLowerCase();
  let matches = 0;
  for (const keyword of keywords) {
    const needle = keyword.trim().toLowerCase();
    if (!needle) {
      continue;
    }
    if (haystack.includes(needle)) {
      matches += 1;
    } else if (needle.includes("-")) {
      const parts = needle.split("-").filter(Boolean);
      if (parts.length > 0 && parts.every((part) => haystack.includes(part))) {
        matches += 1;
      }
    }
  }
  return matches;
};

export const validateSearchResults = (
  results: readonly SearchResult[],
  keywords: readonly string[],
  options: ResultValidationOptions = {}
): ResultValidation => {
  const similarityThreshold = options.similarityThreshold ?? 0.01;
  const minKeywordMatches = options.minKeywordMatches ?? 1;
  const highSimilarityThreshold = options.highSimilarityThreshold ?? 0.4;
  const warn = options.logWarn ?? logWarn;
  const accepted: SearchResult[] = [];
  const warnings: string[] = [];

  for (const result of results) {
    if (result.similarity_score < similarityThreshold) {
      warnings.push(`Low similarity (${result.similarity_score.toFixed(3)}) for: ${preview(result.content)}`);
      continue;
    }

    if (result.similarity_score >= highSimilarityThreshold) {
      accepted.push(result);
      continue;
    }

    const matches = countKeywordMatches(result.content, keywords);
    if (matches < minKeywordMatches) {
      warnings.push(`Insufficient keyword matches (${matches}/${minKeywordMatches}) in: ${preview(result.content)}`);
      continue;
    }

    accepted.push(result);
  }

  if (accepted.length < results.length / 2) {
    warn("search.validation.low_pass_rate", { requestId: options.requestId ?? null }, {
      accepted_count: accepted.length,
      result_count: results.length
    });
  }

  return { accepted, warnings };
};
