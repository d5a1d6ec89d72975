import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { getConfig } from "./config/index.js";
import { logError, logInfo } from "./observability/logger.js";
import { createSearchRuntime } from "./runtime.js";

export async function bootstrap(): Promise<void> {
  const config = getConfig();
  const runtime = await createSearchRuntime(config);

  const app = await buildApp({
    getSearcher: () => runtime.searcher,
    minSources: runtime.minSources,
    corsOrigin: config.CORS_ORIGIN,
    logger: true
  });
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
  logInfo("server.listening", {}, { port: config.PORT });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup_failed", {}, { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
}
