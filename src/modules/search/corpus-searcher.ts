import { ConfigurationError } from "../../config/configuration-error.js";
import { parseWeightingConfig, type WeightingConfig } from "../../config/weighting.js";
import { logInfo } from "../../observability/logger.js";
import { recordSearchLatency } from "../../observability/metrics.js";
import type { Chunk, MetadataFilter } from "../corpus/types.js";
import { applyCombinedWeights, applyQualityWeights, applyRecencyWeights } from "./attribute-weighter.js";
import { DEFAULT_HYBRID_WEIGHTS, fuseScores } from "./hybrid-scorer.js";
import { LexicalIndex } from "./lexical-index.js";
import type { EmbeddingClient, StoreFilter, Vector, VectorMatch, VectorStore } from "./ports.js";
import { createSearchResult, normalizeLexicalScores } from "./score-normalizer.js";
import type {
  HybridSearchOptions,
  QualitySearchOptions,
  RecencySearchOptions,
  SearchOptions,
  SearchResult,
  SearcherStats,
  WeightedSearchOptions
} from "./types.js";

const DEFAULT_LIMIT = 10;
const CANDIDATE_MULTIPLIER = 3;
const DEFAULT_RECENCY_WEIGHT = 0.3;
const DEFAULT_QUALITY_WEIGHT = 0.2;
const DEFAULT_COMBINED_RECENCY_WEIGHT = 0.2;
const DEFAULT_COMBINED_QUALITY_WEIGHT = 0.1;

export interface CorpusSearcherDependencies {
  embeddingClient: EmbeddingClient;
  vectorStore: VectorStore;
  weighting?: WeightingConfig;
  lexicalIndex?: LexicalIndex;
  now?: () => Date;
  clock?: () => number;
  logInfo?: typeof logInfo;
  recordSearchLatency?: typeof recordSearchLatency;
}

const resolveDependencies = (dependencies: CorpusSearcherDependencies) => ({
  embeddingClient: dependencies.embeddingClient,
  vectorStore: dependencies.vectorStore,
  weighting: dependencies.weighting ?? parseWeightingConfig(),
  now: dependencies.now ?? (() => new Date()),
  clock: dependencies.clock ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  recordSearchLatency: dependencies.recordSearchLatency ?? recordSearchLatency
});

const resolveLimit = (limit: number | undefined): number =>
  Math.max(1, Math.floor(limit ?? DEFAULT_LIMIT));

const toStoreFilter = (filter: MetadataFilter | undefined): StoreFilter | undefined => {
  if (!filter) {
    return undefined;
  }
  const storeFilter: StoreFilter = {};
  if (filter.quality_rating) {
    storeFilter.quality_rating = filter.quality_rating;
  }
  if (filter.format) {
    storeFilter.format = filter.format;
  }
  return Object.keys(storeFilter).length > 0 ? storeFilter : undefined;
};

export const matchesTags = (tags: unknown, tagsFilter: readonly string[]): boolean => {
  if (!Array.isArray(tags) || tags.length === 0) {
    return false;
  }
  const chunkTags = tags.filter((tag): tag is string => typeof tag === "string").map((tag) => tag.trim().toLowerCase());
  return tagsFilter.some((tag) => chunkTags.includes(tag.trim().toLowerCase()));
};

// Every dense candidate gets an entry, 0 when the index did not match it.
const scoreCandidates = (dense: readonly SearchResult[], matched: ReadonlyMap<string, number>): Map<string, number> =>
  new Map(dense.map((result) => [result.chunk_id, matched.get(result.chunk_id) ?? 0]));

const countMatches = (lexical: ReadonlyMap<string, number> | undefined): number =>
  lexical ? [...lexical.values()].filter((score) => score > 0).length : 0;

/**
 * Entry point for ranked retrieval over one corpus collection. Holds the
 * current lexical index; everything else is read-only per query.
 */
export class CorpusSearcher {
  private readonly deps: ReturnType<typeof resolveDependencies>;
  private lexicalIndex: LexicalIndex | undefined;

  constructor(dependencies: CorpusSearcherDependencies) {
    this.deps = resolveDependencies(dependencies);
    this.lexicalIndex = dependencies.lexicalIndex;
  }

  static async open(dependencies: CorpusSearcherDependencies): Promise<CorpusSearcher> {
    if (!(await dependencies.vectorStore.exists())) {
      throw new ConfigurationError(`Collection '${dependencies.vectorStore.collection}' not found.`);
    }
    return new CorpusSearcher(dependencies);
  }

  get collection(): string {
    return this.deps.vectorStore.collection;
  }

  get weighting(): WeightingConfig {
    return this.deps.weighting;
  }

  buildLexicalIndex(chunks: readonly Chunk[]): LexicalIndex {
    const index = LexicalIndex.build(chunks);
    this.lexicalIndex = index;
    this.deps.logInfo("search.lexical_index.built", {}, {
      collection: this.collection,
      document_count: index.documentCount,
      average_length: index.averageDocumentLength
    });
    return index;
  }

  async refreshLexicalIndex(): Promise<LexicalIndex> {
    const chunks = await this.deps.vectorStore.listChunks();
    return this.buildLexicalIndex(chunks);
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const startedAt = this.deps.clock();
    const limit = resolveLimit(options.limit);
    const [embedding] = await this.deps.embeddingClient.embed([query]);
    const results = await this.queryWithEmbedding(embedding, limit, options.filter);
    this.complete("search.semantic.complete", startedAt, options.requestId, results.length);
    return results;
  }

  /**
   * One embedding call for every query; ranking per query is the same as
   * calling `search` for each of them.
   */
  async searchBatch(queries: readonly string[], options: SearchOptions = {}): Promise<SearchResult[][]> {
    if (queries.length === 0) {
      return [];
    }
    const startedAt = this.deps.clock();
    const limit = resolveLimit(options.limit);
    const embeddings = await this.deps.embeddingClient.embed([...queries]);
    if (embeddings.length !== queries.length) {
      throw new Error(`Embedding client returned ${embeddings.length} vectors for ${queries.length} queries.`);
    }

    const batches: SearchResult[][] = [];
    for (const embedding of embeddings) {
      batches.push(await this.queryWithEmbedding(embedding, limit, options.filter));
    }
    this.complete("search.batch.complete", startedAt, options.requestId, batches.reduce((sum, list) => sum + list.length, 0), {
      query_count: queries.length
    });
    return batches;
  }

  async hybridSearch(query: string, options: HybridSearchOptions = {}): Promise<SearchResult[]> {
    const startedAt = this.deps.clock();
    const limit = resolveLimit(options.limit);
    const candidateLimit = limit * CANDIDATE_MULTIPLIER;
    const [embedding] = await this.deps.embeddingClient.embed([query]);
    const dense = await this.queryWithEmbedding(embedding, candidateLimit, options.filter);

    const index = this.lexicalIndex;
    const lexical =
      index && index.documentCount > 0
        ? scoreCandidates(dense, normalizeLexicalScores(index.search(query, candidateLimit)))
        : undefined;

    const results = fuseScores(
      dense,
      lexical,
      {
        semanticWeight: options.semanticWeight ?? DEFAULT_HYBRID_WEIGHTS.semanticWeight,
        lexicalWeight: options.lexicalWeight ?? DEFAULT_HYBRID_WEIGHTS.lexicalWeight
      },
      limit
    );
    this.complete("search.hybrid.complete", startedAt, options.requestId, results.length, {
      candidate_count: dense.length,
      lexical_match_count: countMatches(lexical),
      lexical_fallback: lexical === undefined || lexical.size === 0
    });
    return results;
  }

  async searchWithRecency(query: string, options: RecencySearchOptions = {}): Promise<SearchResult[]> {
    const limit = resolveLimit(options.limit);
    const candidates = await this.search(query, { ...options, limit: limit * CANDIDATE_MULTIPLIER });
    return applyRecencyWeights(candidates, options.recencyWeight ?? DEFAULT_RECENCY_WEIGHT, limit, {
      now: this.deps.now(),
      decayRate: this.deps.weighting.recencyDecay
    });
  }

  async searchWithQuality(query: string, options: QualitySearchOptions = {}): Promise<SearchResult[]> {
    const limit = resolveLimit(options.limit);
    const candidates = await this.search(query, { ...options, limit: limit * CANDIDATE_MULTIPLIER });
    return applyQualityWeights(candidates, options.qualityWeight ?? DEFAULT_QUALITY_WEIGHT, limit, {
      qualityWeights: this.deps.weighting.qualityWeights
    });
  }

  async searchWithWeights(query: string, options: WeightedSearchOptions = {}): Promise<SearchResult[]> {
    const limit = resolveLimit(options.limit);
    const candidates = await this.search(query, { ...options, limit: limit * CANDIDATE_MULTIPLIER });
    return applyCombinedWeights(
      candidates,
      {
        recencyWeight: options.recencyWeight ?? DEFAULT_COMBINED_RECENCY_WEIGHT,
        qualityWeight: options.qualityWeight ?? DEFAULT_COMBINED_QUALITY_WEIGHT
      },
      limit,
      { now: this.deps.now(), config: this.deps.weighting, applyTagBoosts: options.applyTagBoosts }
    );
  }

  async getStats(): Promise<SearcherStats> {
    return {
      collection: this.collection,
      total_chunks: await this.deps.vectorStore.count(),
      lexical_documents: this.lexicalIndex?.documentCount ?? 0
    };
  }

  private async queryWithEmbedding(
    embedding: Vector | undefined,
    limit: number,
    filter: MetadataFilter | undefined
  ): Promise<SearchResult[]> {
    if (!embedding || embedding.length === 0) {
      throw new Error("Embedding response missing vector payload.");
    }
    const matches = await this.deps.vectorStore.query(embedding, {
      filter: toStoreFilter(filter),
      limit
    });

    const tagsFilter = filter?.tags?.filter((tag) => tag.trim().length > 0) ?? [];
    return [...matches]
      .sort((left: VectorMatch, right: VectorMatch) => left.distance - right.distance)
      .map(createSearchResult)
      .filter((result) => tagsFilter.length === 0 || matchesTags(result.metadata.tags, tagsFilter))
      .slice(0, limit);
  }

  private complete(
    event: string,
    startedAt: number,
    requestId: string | undefined,
    resultCount: number,
    fields: Record<string, unknown> = {}
  ): void {
    const latencyMs = this.deps.clock() - startedAt;
    this.deps.recordSearchLatency(latencyMs);
    this.deps.logInfo(event, { requestId: requestId ?? null }, {
      collection: this.collection,
      latency_ms: latencyMs,
      result_count: resultCount,
      ...fields
    });
  }
}
