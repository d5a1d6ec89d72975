import { loadEnv, type Env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, loadEnv, parseEnv } from "./env.js";
export { ConfigurationError } from "./configuration-error.js";
export {
  DEFAULT_QUALITY_WEIGHTS,
  DEFAULT_RECENCY_DECAY,
  parseWeightingConfig,
  weightingConfigFromEnv,
  type QualityWeights,
  type WeightingConfig
} from "./weighting.js";

export type Config = Readonly<Env>;

let cached: Config | null = null;

export function getConfig(): Config {
  if (!cached) {
    cached = Object.freeze({ ...loadEnv() });
  }
  return cached;
}

export function resetConfigForTests(): void {
  cached = null;
}
