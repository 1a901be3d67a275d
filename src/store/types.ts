/**
 * Storage boundary of the pipeline
 *
 * The ETL stages only talk to a WarehouseStore, never to a database
 * client. `KyselyWarehouseStore` backs it with PostgreSQL and
 * `MemoryWarehouseStore` keeps everything in process.
 */

import type {
  DimensionKind,
  DimensionRowMap,
  FactFilter,
  FactMetric,
  JoinedFactRow,
  ObservationRecord,
  VarianceView,
} from "../types/index.js";

export interface TableCounts {
  staging: number;
  periods: number;
  entities: number;
  services: number;
  facts: number;
  varianceCells: number;
}

export interface WarehouseStore {
  /** Append staging records; returns the number appended */
  appendRecords(records: readonly ObservationRecord[]): Promise<number>;
  clearStaging(): Promise<void>;
  listStaging(): Promise<ObservationRecord[]>;

  /** Insert rows whose natural key is absent; returns the number inserted */
  upsertDimension<K extends DimensionKind>(
    kind: K,
    rows: readonly DimensionRowMap[K][]
  ): Promise<number>;
  listDimension<K extends DimensionKind>(kind: K): Promise<DimensionRowMap[K][]>;

  /** Replace the whole fact relation atomically */
  replaceFacts(rows: readonly FactMetric[]): Promise<void>;
  listFacts(filter?: FactFilter): Promise<FactMetric[]>;
  queryJoined(): Promise<JoinedFactRow[]>;

  materializeVariance(view: VarianceView): Promise<void>;
  tableCounts(): Promise<TableCounts>;
}

/**
 * One stored cell of the variance relation. Rows with a null entity carry
 * the market variance of their period.
 */
export interface VarianceCell {
  periodKey: string;
  entityName: string | null;
  marketVariancePct: number;
  difference: number | null;
}

/**
 * Natural key of a dimension row
 */
export function dimensionKey(row: DimensionRowMap[DimensionKind]): string {
  if ("periodKey" in row) return row.periodKey;
  if ("canonicalName" in row) return row.canonicalName;
  return row.code;
}
