export { ConfigurationError } from "./config/configuration-error.js";
export { parseWeightingConfig, type WeightingConfig } from "./config/weighting.js";
export * from "./modules/corpus/types.js";
export type { EmbeddingClient, StoreFilter, Vector, VectorMatch, VectorStore } from "./modules/search/ports.js";
export type {
  HybridSearchOptions,
  LexicalMatch,
  QualitySearchOptions,
  RecencySearchOptions,
  SearchOptions,
  SearchResult,
  SearcherStats,
  WeightedSearchOptions
} from "./modules/search/types.js";
export { LexicalIndex, tokenize } from "./modules/search/lexical-index.js";
export { createSearchResult, normalizeLexicalScores, toSimilarity } from "./modules/search/score-normalizer.js";
export { fuseScores, DEFAULT_HYBRID_WEIGHTS, type HybridWeights } from "./modules/search/hybrid-scorer.js";
export {
  applyCombinedWeights,
  applyQualityWeights,
  applyRecencyWeights,
  combineScores,
  NEUTRAL_RECENCY_SCORE,
  resolveRecencySignal,
  scoreQuality,
  scoreRecency,
  type RecencySignal
} from "./modules/search/attribute-weighter.js";
export { CorpusSearcher, type CorpusSearcherDependencies } from "./modules/search/corpus-searcher.js";
export { validateSearchResults } from "./modules/search/result-validator.js";
export {
  createOutline,
  createOutlineSection,
  type Outline,
  type OutlineSection,
  type OutlineSectionInput
} from "./modules/outline/types.js";
export { calculateOutlineStats, flattenSections } from "./modules/outline/outline-stats.js";
export { analyzeOutlineCoverage, analyzeSectionCoverage, type QueryFn } from "./modules/outline/coverage-analyzer.js";
export {
  COVERAGE_WARNING_THRESHOLD,
  KEYWORD_MATCH_REJECTION_RATIO,
  LOW_COVERAGE_PRUNE_THRESHOLD,
  validateOutlineGrounding,
  type GroundingReport
} from "./modules/outline/grounding-validator.js";
export { parseOutlineMarkdown } from "./modules/outline/outline-parser.js";
export { createOpenAIEmbeddingClient } from "./clients/openai.js";
export { createQdrantVectorStore } from "./clients/qdrant.js";
export { buildApp } from "./app.js";
export { createSearchRuntime } from "./runtime.js";
