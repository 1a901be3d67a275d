/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export const QueryMetaSchema = Type.Object({
  executionTimeMs: Type.Number(),
  appliedFilters: Type.Record(Type.String(), Type.Unknown()),
});

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Optional(
      Type.Object({
        total: Type.Optional(Type.Number()),
        query: Type.Optional(QueryMetaSchema),
      })
    ),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const PeriodKeySchema = Type.String({
  pattern: "^\\d{4}-(0[1-9]|1[0-2])$",
  description: "Reporting month, YYYY-MM",
  examples: ["2015-10"],
});

export const MarketSeriesQuerySchema = Type.Union([
  Type.Literal("global"),
  Type.Literal("per-entity"),
]);

export const VarianceFormatSchema = Type.Union([
  Type.Literal("pivot"),
  Type.Literal("long"),
]);
