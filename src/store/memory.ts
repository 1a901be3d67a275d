import { compareFactKeys } from "../services/etl/facts.js";
import { toVarianceCells } from "../services/etl/variance.js";
import { dimensionKey } from "./types.js";

import type { TableCounts, VarianceCell, WarehouseStore } from "./types.js";
import type {
  DimensionKind,
  DimensionRowMap,
  FactFilter,
  FactMetric,
  JoinedFactRow,
  ObservationRecord,
  VarianceView,
} from "../types/index.js";

function factKey(fact: FactMetric): string {
  return `${fact.periodKey}|${fact.entityName}|${fact.serviceCode}`;
}

export function matchesFilter(fact: FactMetric, filter: FactFilter): boolean {
  if (filter.periodFrom !== undefined && fact.periodKey < filter.periodFrom) {
    return false;
  }
  if (filter.periodTo !== undefined && fact.periodKey > filter.periodTo) {
    return false;
  }
  if (
    filter.entityName !== undefined &&
    fact.entityName !== filter.entityName
  ) {
    return false;
  }
  if (
    filter.serviceCode !== undefined &&
    fact.serviceCode !== filter.serviceCode.toUpperCase()
  ) {
    return false;
  }
  return true;
}

/**
 * In-process WarehouseStore
 *
 * Same semantics as the PostgreSQL store: staging is append-only,
 * dimensions are insert-if-absent, facts must reference existing dimension
 * rows and are replaced all-or-nothing. Used by `etl run --dry-run` and by
 * the tests.
 */
export class MemoryWarehouseStore implements WarehouseStore {
  private staging: ObservationRecord[] = [];
  private readonly dimensions: {
    [K in DimensionKind]: Map<string, DimensionRowMap[K]>;
  } = {
    period: new Map(),
    entity: new Map(),
    service: new Map(),
  };
  private facts: FactMetric[] = [];
  private varianceCells: VarianceCell[] = [];
  private lastView: VarianceView | null = null;

  async appendRecords(records: readonly ObservationRecord[]): Promise<number> {
    this.staging.push(...records.map((record) => ({ ...record })));
    return records.length;
  }

  async clearStaging(): Promise<void> {
    this.staging = [];
  }

  async listStaging(): Promise<ObservationRecord[]> {
    return this.staging.map((record) => ({ ...record }));
  }

  async upsertDimension<K extends DimensionKind>(
    kind: K,
    rows: readonly DimensionRowMap[K][]
  ): Promise<number> {
    const table = this.dimensions[kind];
    let inserted = 0;
    for (const row of rows) {
      const key = dimensionKey(row);
      if (!table.has(key)) {
        table.set(key, { ...row });
        inserted++;
      }
    }
    return inserted;
  }

  async listDimension<K extends DimensionKind>(
    kind: K
  ): Promise<DimensionRowMap[K][]> {
    const entries = [...this.dimensions[kind].entries()].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    return entries.map(([, row]) => ({ ...row }));
  }

  async replaceFacts(rows: readonly FactMetric[]): Promise<void> {
    const seen = new Set<string>();
    for (const row of rows) {
      const key = factKey(row);
      if (seen.has(key)) {
        throw new Error(`Duplicate fact row for ${key}`);
      }
      seen.add(key);

      if (
        !this.dimensions.period.has(row.periodKey) ||
        !this.dimensions.entity.has(row.entityName) ||
        !this.dimensions.service.has(row.serviceCode)
      ) {
        throw new Error(`Fact row ${key} references a missing dimension row`);
      }
    }

    this.facts = rows.map((row) => ({ ...row }));
  }

  async listFacts(filter: FactFilter = {}): Promise<FactMetric[]> {
    const matching = this.facts
      .filter((fact) => matchesFilter(fact, filter))
      .sort(compareFactKeys)
      .map((fact) => ({ ...fact }));
    return filter.limit !== undefined
      ? matching.slice(0, filter.limit)
      : matching;
  }

  async queryJoined(): Promise<JoinedFactRow[]> {
    const rows: JoinedFactRow[] = [];
    for (const fact of [...this.facts].sort(compareFactKeys)) {
      const period = this.dimensions.period.get(fact.periodKey);
      const entity = this.dimensions.entity.get(fact.entityName);
      if (period === undefined || entity === undefined) continue;

      rows.push({
        periodKey: period.periodKey,
        year: period.year,
        month: period.month,
        entityName: entity.canonicalName,
        entityActive: entity.active,
        serviceCode: fact.serviceCode,
        rateResolved5d: fact.rateResolved5d,
      });
    }
    return rows;
  }

  async materializeVariance(view: VarianceView): Promise<void> {
    this.varianceCells = toVarianceCells(view);
    this.lastView = view;
  }

  async tableCounts(): Promise<TableCounts> {
    return {
      staging: this.staging.length,
      periods: this.dimensions.period.size,
      entities: this.dimensions.entity.size,
      services: this.dimensions.service.size,
      facts: this.facts.length,
      varianceCells: this.varianceCells.length,
    };
  }

  /** Last view handed to materializeVariance */
  get materializedView(): VarianceView | null {
    return this.lastView;
  }

  get storedVarianceCells(): VarianceCell[] {
    return this.varianceCells.map((cell) => ({ ...cell }));
  }
}
