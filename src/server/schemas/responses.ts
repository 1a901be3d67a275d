/**
 * Response schemas for the data mart API
 */

import { Type } from "@sinclair/typebox";

import { createListResponseSchema, PeriodKeySchema } from "./common.js";

// ============================================================================
// Dimensions
// ============================================================================

export const PeriodSchema = Type.Object(
  {
    periodKey: PeriodKeySchema,
    year: Type.Integer(),
    month: Type.Integer({ minimum: 1, maximum: 12 }),
    quarter: Type.Integer({ minimum: 1, maximum: 4 }),
    half: Type.Integer({ minimum: 1, maximum: 2 }),
  },
  {
    examples: [
      { periodKey: "2015-10", year: 2015, month: 10, quarter: 4, half: 2 },
    ],
  }
);

export const EntitySchema = Type.Object({
  canonicalName: Type.String(),
  active: Type.Boolean(),
});

export const ServiceSchema = Type.Object({
  code: Type.String(),
  displayName: Type.String(),
  category: Type.String(),
});

export const PeriodListResponseSchema = createListResponseSchema(PeriodSchema);
export const EntityListResponseSchema = createListResponseSchema(EntitySchema);
export const ServiceListResponseSchema =
  createListResponseSchema(ServiceSchema);

// ============================================================================
// Facts
// ============================================================================

export const FactSchema = Type.Object({
  periodKey: PeriodKeySchema,
  entityName: Type.String(),
  serviceCode: Type.String(),
  rateResolved5d: Type.Number({ minimum: 0, maximum: 100 }),
  rateResolvedTotal: Type.Number({ minimum: 0, maximum: 100 }),
  totalRequests: Type.Integer({ minimum: 0 }),
  resolvedRequests: Type.Integer({ minimum: 0 }),
});

export const FactListResponseSchema = createListResponseSchema(FactSchema);

// ============================================================================
// Variance
// ============================================================================

// Pivot rows carry period_key, market_variance and one column per entity;
// long rows are the per-(period, entity) changes
export const VarianceRowSchema = Type.Record(
  Type.String(),
  Type.Union([Type.String(), Type.Number()])
);

export const VarianceResponseSchema = Type.Object({
  marketSeries: Type.String(),
  entities: Type.Array(Type.String()),
  format: Type.String(),
  data: Type.Array(VarianceRowSchema),
});
