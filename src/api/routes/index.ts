import type { FastifyInstance } from "fastify";
import { registerOutlineRoutes, type OutlineRoutesDependencies } from "./outline.js";
import { registerSearchRoutes, type SearchRoutesDependencies } from "./search.js";

export type ApiRoutesDependencies = SearchRoutesDependencies & OutlineRoutesDependencies;

export async function registerApiRoutes(app: FastifyInstance, dependencies: ApiRoutesDependencies): Promise<void> {
  await registerSearchRoutes(app, dependencies);
  await registerOutlineRoutes(app, dependencies);
}
