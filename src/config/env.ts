import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./configuration-error.js";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

/**
 * Loads `.env.local` or `.env.prod` from the working directory. Variables that
 * are already set in the process environment always win.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? ((filePath: string, encoding: "utf8") => fs.readFileSync(filePath, encoding));
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }

  return envFilePath;
}

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

export const envSchema = z.object({
  APP_MODE: z.enum(["prod", "local"]).default("local"),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: optionalTrimmedString,
  OPENAI_API_KEY: optionalTrimmedString,
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  QDRANT_URL: optionalTrimmedString,
  QDRANT_API_KEY: optionalTrimmedString,
  QDRANT_COLLECTION: z.string().min(1).default("writing_corpus"),
  LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
  RECENCY_DECAY: z.coerce.number().min(0, "RECENCY_DECAY must not be negative").default(0.1),
  QUALITY_WEIGHT_PREFERRED: z.coerce.number().min(0).default(1.5),
  QUALITY_WEIGHT_REFERENCE: z.coerce.number().min(0).default(1.0),
  QUALITY_WEIGHT_SUPPLEMENTAL: z.coerce.number().min(0).default(0.7),
  QUALITY_WEIGHT_DEPRECATED: z.coerce.number().min(0).default(0.3),
  MIN_COVERAGE_SOURCES: z.coerce.number().int().min(0).default(3)
}).superRefine((value, ctx) => {
  if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["QDRANT_URL"],
      message: "QDRANT_URL is required in prod mode"
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): Env {
  loadModeEnvFile({ processEnv });
  return parseEnv(processEnv);
}
