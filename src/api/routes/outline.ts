import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { analyzeOutlineCoverage, DEFAULT_MIN_SOURCES } from "../../modules/outline/coverage-analyzer.js";
import { validateOutlineGrounding } from "../../modules/outline/grounding-validator.js";
import { parseOutlineMarkdown } from "../../modules/outline/outline-parser.js";
import { createOutline, type OutlineSectionInput } from "../../modules/outline/types.js";
import type { CorpusSearcher } from "../../modules/search/corpus-searcher.js";
import { resolveRequestId } from "./search.js";
import { toValidationError } from "./validation.js";

const sectionSchema: z.ZodType<OutlineSectionInput> = z.lazy(() =>
  z.object({
    title: z.string().trim().min(1, "title is required"),
    description: z.string().optional(),
    subsections: z.array(sectionSchema).optional()
  })
);

const groundBodySchema = z
  .object({
    title: z.string().trim().min(1, "title is required"),
    keywords: z.array(z.string()).default([]),
    sections: z.array(sectionSchema).optional(),
    markdown: z.string().optional(),
    min_sources: z.number().int().min(0).optional()
  })
  .refine((body) => body.sections !== undefined || body.markdown !== undefined, {
    message: "either sections or markdown is required",
    path: ["sections"]
  });

export interface OutlineRoutesDependencies {
  getSearcher: () => Promise<CorpusSearcher> | CorpusSearcher;
  minSources?: number;
}

export async function registerOutlineRoutes(app: FastifyInstance, dependencies: OutlineRoutesDependencies): Promise<void> {
  app.post("/outline/ground", async (request, reply) => {
    const parsed = groundBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "body");
    }

    const requestId = resolveRequestId(request);
    const searcher = await dependencies.getSearcher();
    const outline = createOutline({
      title: parsed.data.title,
      keywords: parsed.data.keywords,
      sections: parsed.data.sections ?? parseOutlineMarkdown(parsed.data.markdown ?? "")
    });

    await analyzeOutlineCoverage(
      outline,
      (query, limit) => searcher.search(query, { limit, requestId }),
      parsed.data.min_sources ?? dependencies.minSources ?? DEFAULT_MIN_SOURCES
    );
    const report = validateOutlineGrounding(outline, outline.keywords, { requestId });

    return { outline, report };
  });
}
