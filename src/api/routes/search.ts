import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import { QUALITY_RATINGS } from "../../modules/corpus/types.js";
import type { CorpusSearcher } from "../../modules/search/corpus-searcher.js";
import { validateSearchResults } from "../../modules/search/result-validator.js";
import type { SearchResult } from "../../modules/search/types.js";
import { toValidationError } from "./validation.js";

const MAX_LIMIT = 100;

const filterSchema = z
  .object({
    quality_rating: z.enum(QUALITY_RATINGS).optional(),
    format: z.string().trim().min(1).optional(),
    tags: z.array(z.string().trim().min(1)).optional()
  })
  .optional();

const searchBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  limit: z.number().int().min(1).max(MAX_LIMIT).default(10),
  mode: z.enum(["semantic", "hybrid", "recency", "quality", "weighted"]).default("semantic"),
  filter: filterSchema,
  semantic_weight: z.number().finite().optional(),
  lexical_weight: z.number().finite().optional(),
  recency_weight: z.number().finite().optional(),
  quality_weight: z.number().finite().optional(),
  apply_tag_boosts: z.boolean().optional(),
  validate_keywords: z.array(z.string()).optional()
});

const batchBodySchema = z.object({
  queries: z.array(z.string().trim().min(1)).max(MAX_LIMIT),
  limit: z.number().int().min(1).max(MAX_LIMIT).default(10),
  filter: filterSchema
});

export type SearchBody = z.infer<typeof searchBodySchema>;

export interface SearchRoutesDependencies {
  getSearcher: () => Promise<CorpusSearcher> | CorpusSearcher;
}

export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

const runSearch = (searcher: CorpusSearcher, body: SearchBody, requestId: string): Promise<SearchResult[]> => {
  const base = { limit: body.limit, filter: body.filter, requestId };
  switch (body.mode) {
    case "hybrid":
      return searcher.hybridSearch(body.query, {
        ...base,
        semanticWeight: body.semantic_weight,
        lexicalWeight: body.lexical_weight
      });
    case "recency":
      return searcher.searchWithRecency(body.query, { ...base, recencyWeight: body.recency_weight });
    case "quality":
      return searcher.searchWithQuality(body.query, { ...base, qualityWeight: body.quality_weight });
    case "weighted":
      return searcher.searchWithWeights(body.query, {
        ...base,
        recencyWeight: body.recency_weight,
        qualityWeight: body.quality_weight,
        applyTagBoosts: body.apply_tag_boosts
      });
    case "semantic":
      return searcher.search(body.query, base);
  }
};

export async function registerSearchRoutes(app: FastifyInstance, dependencies: SearchRoutesDependencies): Promise<void> {
  app.post("/search", async (request, reply) => {
    const parsed = searchBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "body");
    }

    const requestId = resolveRequestId(request);
    const searcher = await dependencies.getSearcher();
    const results = await runSearch(searcher, parsed.data, requestId);

    if (parsed.data.validate_keywords) {
      const validation = validateSearchResults(results, parsed.data.validate_keywords, { requestId });
      return { mode: parsed.data.mode, results: validation.accepted, warnings: validation.warnings };
    }
    return { mode: parsed.data.mode, results, warnings: [] };
  });

  app.post("/search/batch", async (request, reply) => {
    const parsed = batchBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "body");
    }

    const searcher = await dependencies.getSearcher();
    const results = await searcher.searchBatch(parsed.data.queries, {
      limit: parsed.data.limit,
      filter: parsed.data.filter,
      requestId: resolveRequestId(request)
    });
    return { results };
  });

  app.get("/stats", async () => {
    const searcher = await dependencies.getSearcher();
    return searcher.getStats();
  });
}
