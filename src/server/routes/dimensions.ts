/**
 * Dimension Routes - /api/v1/periods, /api/v1/entities, /api/v1/services
 */

import {
  EntityListResponseSchema,
  PeriodListResponseSchema,
  ServiceListResponseSchema,
} from "../schemas/responses.js";
import { fromStore, type ApiContext } from "./context.js";

import type { FastifyInstance } from "fastify";

export function registerDimensionRoutes(
  app: FastifyInstance,
  { store }: ApiContext
): void {
  /**
   * GET /api/v1/periods
   */
  app.get(
    "/periods",
    {
      schema: {
        summary: "List reporting periods",
        tags: ["Dimensions"],
        response: { 200: PeriodListResponseSchema },
      },
    },
    async () => {
      const data = await fromStore("periods", store.listDimension("period"));
      return { data, meta: { total: data.length } };
    }
  );

  /**
   * GET /api/v1/entities
   */
  app.get(
    "/entities",
    {
      schema: {
        summary: "List canonical entities",
        tags: ["Dimensions"],
        response: { 200: EntityListResponseSchema },
      },
    },
    async () => {
      const data = await fromStore("entities", store.listDimension("entity"));
      return { data, meta: { total: data.length } };
    }
  );

  /**
   * GET /api/v1/services
   */
  app.get(
    "/services",
    {
      schema: {
        summary: "List services",
        tags: ["Dimensions"],
        response: { 200: ServiceListResponseSchema },
      },
    },
    async () => {
      const data = await fromStore("services", store.listDimension("service"));
      return { data, meta: { total: data.length } };
    }
  );
}
