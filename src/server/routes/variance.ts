/**
 * Variance Routes - /api/v1/variance
 */

import { Type, type Static } from "@sinclair/typebox";

import { loadVarianceView, toPivotTable } from "../../services/etl/variance.js";
import { NoDataError } from "../plugins/error-handler.js";
import {
  MarketSeriesQuerySchema,
  VarianceFormatSchema,
} from "../schemas/common.js";
import { VarianceResponseSchema } from "../schemas/responses.js";
import { fromStore, type ApiContext } from "./context.js";

import type { FastifyInstance } from "fastify";

const VarianceQuerySchema = Type.Object({
  marketSeries: Type.Optional(MarketSeriesQuerySchema),
  format: Type.Optional(VarianceFormatSchema),
});

type VarianceQuery = Static<typeof VarianceQuerySchema>;

export function registerVarianceRoutes(
  app: FastifyInstance,
  { store, config }: ApiContext
): void {
  /**
   * GET /api/v1/variance
   * Market vs entity month-over-month change of the 5-day resolution rate
   */
  const varianceRouteSchema = {
    summary: "Market vs entity variance",
    description:
      "`format=pivot` returns one row per period with one column per entity " +
      "(market change minus entity change, 0 where undefined). " +
      "`format=long` returns the per-(period, entity) changes.",
    tags: ["Variance"],
    querystring: VarianceQuerySchema,
    response: { 200: VarianceResponseSchema },
  };

  app.get<{ Querystring: VarianceQuery }>(
    "/variance",
    {
      schema: varianceRouteSchema,
    },
    async (request) => {
      const marketSeries =
        request.query.marketSeries ?? config.variance.marketSeries;
      const format = request.query.format ?? "pivot";

      const view = await fromStore(
        "variance",
        loadVarianceView(store, { marketSeries })
      );
      if (view.rows.length === 0) {
        throw new NoDataError(
          "No variance rows: the mart needs facts for at least two periods"
        );
      }

      return {
        marketSeries,
        entities: view.entities,
        format,
        data: format === "pivot" ? toPivotTable(view) : view.deltas,
      };
    }
  );
}
