/**
 * Fact Routes - /api/v1/facts
 */

import { Type, type Static } from "@sinclair/typebox";

import { NotFoundError, ValidationError } from "../plugins/error-handler.js";
import { PeriodKeySchema } from "../schemas/common.js";
import { FactListResponseSchema } from "../schemas/responses.js";
import { fromStore, type ApiContext } from "./context.js";

import type { FactFilter } from "../../types/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ListFactsQuerySchema = Type.Object({
  periodFrom: Type.Optional(PeriodKeySchema),
  periodTo: Type.Optional(PeriodKeySchema),
  entity: Type.Optional(
    Type.String({ minLength: 1, description: "Canonical entity name" })
  ),
  service: Type.Optional(
    Type.String({ minLength: 1, description: "Service code, e.g. SMP" })
  ),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 5000 })),
});

type ListFactsQuery = Static<typeof ListFactsQuerySchema>;

export function toApiFactFilter(query: ListFactsQuery): FactFilter {
  const filter: FactFilter = {};
  if (query.periodFrom !== undefined) filter.periodFrom = query.periodFrom;
  if (query.periodTo !== undefined) filter.periodTo = query.periodTo;
  if (query.entity !== undefined) filter.entityName = query.entity.toUpperCase();
  if (query.service !== undefined) filter.serviceCode = query.service.toUpperCase();
  if (query.limit !== undefined) filter.limit = query.limit;
  return filter;
}

// ============================================================================
// Routes
// ============================================================================

export function registerFactRoutes(
  app: FastifyInstance,
  { store }: ApiContext
): void {
  /**
   * GET /api/v1/facts
   * Fact rows ordered by (period, entity, service)
   */
  const listFactsRouteSchema = {
    summary: "List fact rows",
    description:
      "Examples:\n- `/facts?periodFrom=2015-01&periodTo=2015-06`\n" +
      "- `/facts?entity=OI&service=SMP`",
    tags: ["Facts"],
    querystring: ListFactsQuerySchema,
    response: { 200: FactListResponseSchema },
  };

  app.get<{ Querystring: ListFactsQuery }>(
    "/facts",
    {
      schema: listFactsRouteSchema,
    },
    async (request) => {
      const startTime = Date.now();
      const { periodFrom, periodTo } = request.query;

      if (
        periodFrom !== undefined &&
        periodTo !== undefined &&
        periodFrom > periodTo
      ) {
        throw new ValidationError("periodFrom must not be after periodTo", {
          periodFrom,
          periodTo,
        });
      }

      const filter = toApiFactFilter(request.query);
      if (filter.entityName !== undefined) {
        const entities = await fromStore(
          "entities",
          store.listDimension("entity")
        );
        const known = entities.some(
          (entity) => entity.canonicalName === filter.entityName
        );
        if (!known) {
          throw new NotFoundError(`Entity ${filter.entityName} not found`);
        }
      }

      const data = await fromStore("facts", store.listFacts(filter));

      return {
        data,
        meta: {
          total: data.length,
          query: {
            executionTimeMs: Date.now() - startTime,
            appliedFilters: { ...filter },
          },
        },
      };
    }
  );
}
