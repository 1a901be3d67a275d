// Domain types shared by the ETL stages, the stores and the API

// =====================
// Raw extract
// =====================

export type RawCell = string | number | boolean | null;

export interface YearMonth {
  year: number;
  month: number;
}

/**
 * One decoded spreadsheet sheet, before any reshaping.
 * `rows` is the cell grid exactly as the sheet holds it (preamble included).
 */
export interface RawTable {
  serviceCode: string;
  source: string;
  rows: RawCell[][];
  /** Reporting period of the whole sheet, when known up front */
  period?: YearMonth;
  /** Year used for headers that only carry a month name */
  defaultYear?: number;
}

// =====================
// Staging
// =====================

export interface ObservationRecord {
  periodYear: number;
  periodMonth: number;
  /** "YYYY-MM" */
  periodKey: string;
  serviceCode: string;
  entityRaw: string;
  variableName: string;
  value: number;
  sourceFile: string;
}

// =====================
// Dimensions
// =====================

export interface PeriodRow {
  periodKey: string;
  year: number;
  month: number;
  quarter: number;
  half: number;
}

export interface EntityRow {
  canonicalName: string;
  active: boolean;
}

export interface ServiceRow {
  code: string;
  displayName: string;
  category: string;
}

export interface DimensionRowMap {
  period: PeriodRow;
  entity: EntityRow;
  service: ServiceRow;
}

export type DimensionKind = keyof DimensionRowMap;

export interface DimensionSnapshot {
  periods: PeriodRow[];
  entities: EntityRow[];
  services: ServiceRow[];
}

// =====================
// Facts
// =====================

export interface FactMetric {
  periodKey: string;
  entityName: string;
  serviceCode: string;
  rateResolved5d: number;
  rateResolvedTotal: number;
  totalRequests: number;
  resolvedRequests: number;
}

export interface FactFilter {
  periodFrom?: string;
  periodTo?: string;
  entityName?: string;
  serviceCode?: string;
  limit?: number;
}

/**
 * Fact row joined with its Period and Entity dimension rows
 */
export interface JoinedFactRow {
  periodKey: string;
  year: number;
  month: number;
  entityName: string;
  entityActive: boolean;
  serviceCode: string;
  rateResolved5d: number;
}

// =====================
// Variance
// =====================

export type MarketSeriesVariant = "global" | "per-entity";

export interface VarianceRow {
  periodKey: string;
  marketVariancePct: number;
  /** Keyed by canonical entity name; one key per discovered entity */
  differences: Record<string, number>;
}

export interface VarianceDelta {
  periodKey: string;
  entityName: string;
  marketChangePct: number;
  entityChangePct: number;
  difference: number;
}

export interface VarianceView {
  marketSeries: MarketSeriesVariant;
  entities: string[];
  rows: VarianceRow[];
  deltas: VarianceDelta[];
}

export type PivotTableRow = Record<string, string | number>;
