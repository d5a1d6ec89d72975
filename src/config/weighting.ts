import { z } from "zod";
import { QUALITY_RATINGS, type QualityRating } from "../modules/corpus/types.js";
import { ConfigurationError } from "./configuration-error.js";
import type { Env } from "./env.js";

export type QualityWeights = Readonly<Record<QualityRating, number>>;

export interface WeightingConfig {
  qualityWeights: QualityWeights;
  /** Recency lost per year of document age. */
  recencyDecay: number;
  tagBoosts: Readonly<Record<string, number>>;
}

export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = Object.freeze({
  preferred: 1.5,
  reference: 1.0,
  supplemental: 0.7,
  deprecated: 0.3
});

export const DEFAULT_RECENCY_DECAY = 0.1;

const nonNegative = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().min(0, `${label} must not be negative`);

const qualityWeightsSchema = z
  .object({
    preferred: nonNegative("qualityWeights.preferred"),
    reference: nonNegative("qualityWeights.reference"),
    supplemental: nonNegative("qualityWeights.supplemental"),
    deprecated: nonNegative("qualityWeights.deprecated")
  })
  .strict()
  .refine((weights) => QUALITY_RATINGS.some((rating) => weights[rating] > 0), {
    message: "at least one quality weight must be positive"
  });

export const weightingConfigSchema = z.object({
  qualityWeights: qualityWeightsSchema.default({ ...DEFAULT_QUALITY_WEIGHTS }),
  recencyDecay: nonNegative("recencyDecay").default(DEFAULT_RECENCY_DECAY),
  tagBoosts: z.record(z.string(), nonNegative("tagBoosts")).default({})
});

export type WeightingConfigInput = z.input<typeof weightingConfigSchema>;

export function parseWeightingConfig(input: WeightingConfigInput = {}): WeightingConfig {
  const parsed = weightingConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "weighting"}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid weighting configuration:\n${details}`);
  }

  const tagBoosts: Record<string, number> = {};
  for (const [tag, boost] of Object.entries(parsed.data.tagBoosts)) {
    tagBoosts[tag.trim().toLowerCase()] = boost;
  }

  return Object.freeze({
    qualityWeights: Object.freeze({ ...parsed.data.qualityWeights }),
    recencyDecay: parsed.data.recencyDecay,
    tagBoosts: Object.freeze(tagBoosts)
  });
}

export const weightingConfigFromEnv = (env: Env): WeightingConfig =>
  parseWeightingConfig({
    qualityWeights: {
      preferred: env.QUALITY_WEIGHT_PREFERRED,
      reference: env.QUALITY_WEIGHT_REFERENCE,
      supplemental: env.QUALITY_WEIGHT_SUPPLEMENTAL,
      deprecated: env.QUALITY_WEIGHT_DEPRECATED
    },
    recencyDecay: env.RECENCY_DECAY
  });
