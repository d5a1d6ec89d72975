import type { SearchResult } from "../search/types.js";
import { calculateOutlineStats } from "./outline-stats.js";
import type { Outline, OutlineSection } from "./types.js";

export type QueryFn = (query: string, limit: number) => Promise<SearchResult[]>;

export const COVERAGE_QUERY_LIMIT = 10;
export const DEFAULT_MIN_SOURCES = 3;
const QUERY_KEYWORD_COUNT = 2;
// Similarity at which a section counts as fully covered.
const FULL_COVERAGE_SIMILARITY = 0.25;
const FULL_COVERAGE_RESULT_COUNT = 2;
const BEST_MATCH_SHARE = 0.9;

export const NO_COVERAGE_NOTE = "No corpus coverage found for this topic";

export const buildCoverageQuery = (section: Pick<OutlineSection, "title" | "description">, keywords: readonly string[]): string =>
  [section.title, section.description, ...keywords.slice(0, QUERY_KEYWORD_COUNT)]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(" ");

export const countDistinctDocuments = (results: readonly SearchResult[]): number => {
  const documentIds = new Set<string>();
  for (const result of results) {
    const documentId = result.metadata.document_id;
    if (typeof documentId === "string" && documentId.length > 0) {
      documentIds.add(documentId);
    }
  }
  return documentIds.size;
};

/**
 * Coverage in [0, 100] from the best match, the mean of positive matches and
 * how many positive matches there are.
 */
export const computeCoveragePct = (results: readonly SearchResult[]): number => {
  if (results.length === 0) {
    return 0.0;
  }

  const clamped = results.map((result) => Math.max(0.0, result.similarity_score));
  const best = Math.max(...clamped);
  const positive = clamped.filter((score) => score > 0);
  const mean = positive.length > 0 ? positive.reduce((sum, score) => sum + score, 0) / positive.length : 0.0;

  const effective = BEST_MATCH_SHARE * best + (1 - BEST_MATCH_SHARE) * mean;
  const normalized = Math.min(effective / FULL_COVERAGE_SIMILARITY, 1.0);
  const resultFactor = Math.min(positive.length / FULL_COVERAGE_RESULT_COUNT, 1.0);

  return resultFactor * normalized * 100.0;
};

/**
 * Writes coverage_pct, source_count and notes on the section and every
 * descendant. Each section is scored from its own retrieval; nothing is
 * inherited from the parent.
 */
export const analyzeSectionCoverage = async (
  section: OutlineSection,
  keywords: readonly string[],
  retrieve: QueryFn,
  minSources: number = DEFAULT_MIN_SOURCES
): Promise<void> => {
  const results = await retrieve(buildCoverageQuery(section, keywords), COVERAGE_QUERY_LIMIT);

  if (results.length === 0) {
    section.coverage_pct = 0.0;
    section.source_count = 0;
    section.notes = NO_COVERAGE_NOTE;
  } else {
    section.coverage_pct = computeCoveragePct(results);
    section.source_count = countDistinctDocuments(results);
    section.notes = section.source_count < minSources ? `Limited sources (${section.source_count} documents)` : "";
  }

  for (const subsection of section.subsections) {
    await analyzeSectionCoverage(subsection, keywords, retrieve, minSources);
  }
};

export const analyzeOutlineCoverage = async (
  outline: Outline,
  retrieve: QueryFn,
  minSources: number = DEFAULT_MIN_SOURCES
): Promise<void> => {
  for (const section of outline.sections) {
    await analyzeSectionCoverage(section, outline.keywords, retrieve, minSources);
  }
  calculateOutlineStats(outline);
};
