import { createCollectionClient, createQdrantVectorStore } from "./clients/qdrant.js";
import { createOpenAIEmbeddingClient } from "./clients/openai.js";
import type { Config } from "./config/index.js";
import { weightingConfigFromEnv } from "./config/weighting.js";
import { CorpusSearcher } from "./modules/search/corpus-searcher.js";
import { logInfo } from "./observability/logger.js";

export interface SearchRuntime {
  searcher: CorpusSearcher;
  minSources: number;
}

/**
 * Wires one embedding client and one vector store into a searcher and
 * builds its lexical index from the collection.
 */
export async function createSearchRuntime(config: Config): Promise<SearchRuntime> {
  const embeddingClient = createOpenAIEmbeddingClient({
    apiKey: config.OPENAI_API_KEY,
    model: config.EMBEDDING_MODEL
  });
  const vectorStore = createQdrantVectorStore(createCollectionClient(config), config.QDRANT_COLLECTION);
  const searcher = await CorpusSearcher.open({
    embeddingClient,
    vectorStore,
    weighting: weightingConfigFromEnv(config)
  });
  const index = await searcher.refreshLexicalIndex();

  logInfo("runtime.ready", {}, {
    collection: config.QDRANT_COLLECTION,
    embedding_model: config.EMBEDDING_MODEL,
    lexical_documents: index.documentCount
  });

  return { searcher, minSources: config.MIN_COVERAGE_SOURCES };
}
