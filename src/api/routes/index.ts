import type { FastifyInstance } from "fastify";
import { registerLiteratureRoutes, type LiteratureRoutesDependencies } from "./literature.js";

export interface ApiRoutesDependencies {
  literature?: LiteratureRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerLiteratureRoutes(app, dependencies?.literature);
}
