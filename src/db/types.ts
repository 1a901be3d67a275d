import type { Generated, Insertable, Selectable } from "kysely";

// ============================================================================
// Table Types (matching sql/schema.sql)
// ============================================================================

export interface StagingObservationsTable {
  id: Generated<number>;
  period_year: number;
  period_month: number;
  period_key: string;
  service_code: string;
  entity_raw: string;
  variable_name: string;
  value: number;
  source_file: string;
  loaded_at: Generated<Date>;
}

export interface DimPeriodsTable {
  id: Generated<number>;
  period_key: string;
  year: number;
  month: number;
  quarter: number;
  half: number;
}

export interface DimEntitiesTable {
  id: Generated<number>;
  canonical_name: string;
  active: Generated<boolean>;
}

export interface DimServicesTable {
  id: Generated<number>;
  code: string;
  display_name: string;
  category: string;
}

export interface FactMetricsTable {
  id: Generated<number>;
  period_key: string;
  entity_name: string;
  service_code: string;
  // NUMERIC, parsed to number in connection.ts
  rate_resolved_5d: number;
  rate_resolved_total: number;
  total_requests: number;
  resolved_requests: number;
}

export interface VarianceCellsTable {
  id: Generated<number>;
  period_key: string;
  entity_name: string | null;
  market_variance: number;
  difference: number | null;
  market_series: string;
  built_at: Generated<Date>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  staging_observations: StagingObservationsTable;
  dim_periods: DimPeriodsTable;
  dim_entities: DimEntitiesTable;
  dim_services: DimServicesTable;
  fact_metrics: FactMetricsTable;
  variance_cells: VarianceCellsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type StagingObservation = Selectable<StagingObservationsTable>;
export type NewStagingObservation = Insertable<StagingObservationsTable>;
export type DimPeriod = Selectable<DimPeriodsTable>;
export type DimEntity = Selectable<DimEntitiesTable>;
export type DimService = Selectable<DimServicesTable>;
export type FactMetricRow = Selectable<FactMetricsTable>;
export type NewFactMetric = Insertable<FactMetricsTable>;
export type NewVarianceCell = Insertable<VarianceCellsTable>;
