import { afterEach, beforeEach, vi } from "vitest";
import { resetConfigForTests } from "../../src/config/index.js";
import { resetMetrics } from "../../src/observability/metrics.js";

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  resetMetrics();
});

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  resetConfigForTests();
});
