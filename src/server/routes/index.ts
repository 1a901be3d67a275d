/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerDimensionRoutes } from "./dimensions.js";
import { registerFactRoutes } from "./facts.js";
import { registerVarianceRoutes } from "./variance.js";

import type { ApiContext } from "./context.js";
import type { FastifyInstance } from "fastify";

const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register /health and the /api/v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  context: ApiContext
): Promise<void> {
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  await app.register(
    (api) => {
      registerDimensionRoutes(api, context);
      registerFactRoutes(api, context);
      registerVarianceRoutes(api, context);
    },
    { prefix: "/api/v1" }
  );
}
