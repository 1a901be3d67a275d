import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { registerApiRoutes } from "./routes/index.js";

import type { ApiContext } from "./routes/context.js";

/**
 * Build the API application without listening
 */
export async function buildApp(
  context: ApiContext,
  options: FastifyServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify(options);

  await app.register(cors, {
    origin: true,
  });
  await app.register(errorHandler);
  await registerApiRoutes(app, context);

  return app;
}
