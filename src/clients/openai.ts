import OpenAI from "openai";
import { ConfigurationError } from "../config/configuration-error.js";
import { logDebug } from "../observability/logger.js";
import { recordEmbeddingLatency } from "../observability/metrics.js";
import type { EmbeddingClient, Vector } from "../modules/search/ports.js";

const REQUEST_TIMEOUT_MS = 7000;
const REQUEST_RETRIES = 2;

/** The slice of the OpenAI SDK the embedding client calls. */
export interface EmbeddingsApi {
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbeddingClientOptions {
  apiKey?: string;
  model: string;
  api?: EmbeddingsApi;
  now?: () => number;
}

export interface OpenAIEmbeddingClient extends EmbeddingClient {
  readonly model: string;
  cacheSize(): number;
}

export function createOpenAIEmbeddingClient(options: OpenAIEmbeddingClientOptions): OpenAIEmbeddingClient {
  const api = options.api ?? createOpenAIApi(options.apiKey);
  const now = options.now ?? Date.now;
  const cache = new Map<string, Vector>();

  return {
    model: options.model,

    cacheSize() {
      return cache.size;
    },

    async embed(texts) {
      const pending = [...new Set(texts.filter((text) => !cache.has(text)))];

      if (pending.length > 0) {
        const startedAt = now();
        const response = await api.embeddings.create({ model: options.model, input: pending });
        recordEmbeddingLatency(now() - startedAt);

        const ordered = [...(response.data ?? [])].sort((left, right) => left.index - right.index);
        if (ordered.length !== pending.length) {
          throw new Error(`Embedding response returned ${ordered.length} vectors for ${pending.length} inputs.`);
        }
        ordered.forEach((item, position) => {
          if (!Array.isArray(item.embedding) || item.embedding.length === 0) {
            throw new Error("Embedding response missing vector payload.");
          }
          cache.set(pending[position], item.embedding);
        });
        logDebug("embeddings.create.complete", {}, {
          model: options.model,
          input_count: pending.length,
          cached_count: texts.length - pending.length
        });
      }

      return texts.map((text) => {
        const vector = cache.get(text);
        if (!vector) {
          throw new Error("Embedding response missing vector payload.");
        }
        return vector;
      });
    }
  };
}

function createOpenAIApi(apiKey: string | undefined): EmbeddingsApi {
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is missing.");
  }
  return new OpenAI({
    apiKey,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });
}
