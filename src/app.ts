import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { ConfigurationError } from "./config/configuration-error.js";
import { registerApiRoutes, type ApiRoutesDependencies } from "./api/routes/index.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { logError } from "./observability/logger.js";
import { recordErrorRate, registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";

export interface BuildAppOptions extends ApiRoutesDependencies {
  corsOrigin?: string;
  logger?: boolean;
}

export function buildAllowedOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return configured && configured.length > 0
    ? configured
    : ["http://localhost:5173", "http://127.0.0.1:5173"];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  await app.register(cors, {
    origin: buildAllowedOrigins(options.corsOrigin),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ConfigurationError) {
      recordErrorRate("configuration");
      logError("http.configuration_error", { requestId: request.id }, { error: error.message });
      reply.code(503).send({ detail: error.message });
      return;
    }
    reply.send(error);
  });

  registerRequestMetricsHooks(app);
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  await registerApiRoutes(app, options);

  return app;
}
