/**
 * Variance View Builder
 *
 * Compares each entity's month-over-month change of the 5-day resolution
 * rate against the market's change for the same month:
 *
 *   entity metric  = mean rate across services per (period, entity)
 *   market metric  = mean of the entity metrics per period
 *   change         = (curr - prev) / prev * 100, null when prev <= 0
 *   difference     = market change - entity change
 *
 * Columns of the resulting pivot are discovered from the Entity dimension at
 * build time.
 */

import { mean, roundHalfAwayFromZero } from "../../utils/numbers.js";

import type { VarianceCell, WarehouseStore } from "../../store/types.js";
import type {
  EntityRow,
  JoinedFactRow,
  MarketSeriesVariant,
  PivotTableRow,
  VarianceDelta,
  VarianceRow,
  VarianceView,
} from "../../types/index.js";

export interface VarianceOptions {
  marketSeries: MarketSeriesVariant;
}

interface DeltaRow {
  periodKey: string;
  entityName: string;
  marketChange: number | null;
  entityChange: number | null;
}

// ============================================================================
// Helpers
// ============================================================================

export function percentChange(
  previous: number | undefined,
  current: number
): number | null {
  if (previous === undefined || previous <= 0) {
    return null;
  }
  return ((current - previous) / previous) * 100;
}

function byKey(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

// ============================================================================
// Series
// ============================================================================

/**
 * Mean rate per entity per period: entity -> (period -> value)
 */
function entityMonthMetrics(
  facts: readonly JoinedFactRow[]
): Map<string, Map<string, number>> {
  const samples = new Map<string, Map<string, number[]>>();
  for (const fact of facts) {
    let periods = samples.get(fact.entityName);
    if (periods === undefined) {
      periods = new Map();
      samples.set(fact.entityName, periods);
    }
    const values = periods.get(fact.periodKey) ?? [];
    values.push(fact.rateResolved5d);
    periods.set(fact.periodKey, values);
  }

  const metrics = new Map<string, Map<string, number>>();
  for (const [entity, periods] of samples) {
    metrics.set(
      entity,
      new Map([...periods].map(([period, values]) => [period, mean(values)]))
    );
  }
  return metrics;
}

function marketMonthMetrics(
  entityMetrics: Map<string, Map<string, number>>
): Map<string, number> {
  const samples = new Map<string, number[]>();
  for (const periods of entityMetrics.values()) {
    for (const [period, value] of periods) {
      const values = samples.get(period) ?? [];
      values.push(value);
      samples.set(period, values);
    }
  }
  return new Map(
    [...samples].map(([period, values]) => [period, mean(values)])
  );
}

/**
 * Change of each point against the point before it in the same series
 */
function seriesChanges(
  periods: readonly string[],
  valueAt: (period: string) => number
): Map<string, number | null> {
  const changes = new Map<string, number | null>();
  let previous: number | undefined;
  for (const period of periods) {
    const current = valueAt(period);
    changes.set(period, percentChange(previous, current));
    previous = current;
  }
  return changes;
}

function computeDeltaRows(
  facts: readonly JoinedFactRow[],
  marketSeries: MarketSeriesVariant
): DeltaRow[] {
  const entityMetrics = entityMonthMetrics(facts);
  const marketMetrics = marketMonthMetrics(entityMetrics);
  const marketAt = (period: string): number => marketMetrics.get(period) ?? 0;

  const globalChanges = seriesChanges(
    [...marketMetrics.keys()].sort(byKey),
    marketAt
  );

  const rows: DeltaRow[] = [];
  for (const [entityName, metrics] of entityMetrics) {
    const periods = [...metrics.keys()].sort(byKey);
    const entityChanges = seriesChanges(
      periods,
      (period) => metrics.get(period) ?? 0
    );
    const marketChanges =
      marketSeries === "global"
        ? globalChanges
        : seriesChanges(periods, marketAt);

    for (const periodKey of periods) {
      rows.push({
        periodKey,
        entityName,
        marketChange: marketChanges.get(periodKey) ?? null,
        entityChange: entityChanges.get(periodKey) ?? null,
      });
    }
  }

  return rows.sort(
    (a, b) =>
      byKey(a.periodKey, b.periodKey) || byKey(a.entityName, b.entityName)
  );
}

// ============================================================================
// View
// ============================================================================

/**
 * Build the market-vs-entity variance view from joined fact rows
 */
export function buildVarianceView(
  facts: readonly JoinedFactRow[],
  entities: readonly EntityRow[],
  options: VarianceOptions
): VarianceView {
  const columns = entities
    .filter((entity) => entity.active)
    .map((entity) => entity.canonicalName)
    .sort(byKey);

  const deltaRows = computeDeltaRows(facts, options.marketSeries);

  // Rows without a market change carry no comparison
  const byPeriod = new Map<string, DeltaRow[]>();
  for (const row of deltaRows) {
    if (row.marketChange === null) continue;
    const rows = byPeriod.get(row.periodKey) ?? [];
    rows.push(row);
    byPeriod.set(row.periodKey, rows);
  }

  const rows: VarianceRow[] = [];
  for (const [periodKey, periodRows] of byPeriod) {
    const marketChanges: number[] = [];
    const best = new Map<string, number>();

    for (const row of periodRows) {
      if (row.marketChange === null) continue;
      marketChanges.push(row.marketChange);
      if (row.entityChange === null) continue;

      const difference = row.marketChange - row.entityChange;
      const current = best.get(row.entityName);
      if (current === undefined || difference > current) {
        best.set(row.entityName, difference);
      }
    }

    const differences: Record<string, number> = {};
    for (const column of columns) {
      const difference = best.get(column);
      differences[column] =
        difference === undefined ? 0 : roundHalfAwayFromZero(difference, 1);
    }

    rows.push({
      periodKey,
      marketVariancePct: roundHalfAwayFromZero(mean(marketChanges), 1),
      differences,
    });
  }

  const deltas: VarianceDelta[] = [];
  for (const row of deltaRows) {
    if (row.marketChange === null || row.entityChange === null) continue;
    deltas.push({
      periodKey: row.periodKey,
      entityName: row.entityName,
      marketChangePct: roundHalfAwayFromZero(row.marketChange, 2),
      entityChangePct: roundHalfAwayFromZero(row.entityChange, 2),
      difference: roundHalfAwayFromZero(
        row.marketChange - row.entityChange,
        2
      ),
    });
  }

  return {
    marketSeries: options.marketSeries,
    entities: columns,
    rows: rows.sort((a, b) => byKey(a.periodKey, b.periodKey)),
    deltas,
  };
}

/**
 * Build the view from the facts and entities currently in the store
 */
export async function loadVarianceView(
  store: WarehouseStore,
  options: VarianceOptions
): Promise<VarianceView> {
  const [joined, entities] = await Promise.all([
    store.queryJoined(),
    store.listDimension("entity"),
  ]);
  return buildVarianceView(joined, entities, options);
}

// ============================================================================
// Output boundary
// ============================================================================

export const PIVOT_PERIOD_COLUMN = "period_key";
export const PIVOT_MARKET_COLUMN = "market_variance";

/**
 * Serialize the view into flat table rows, one column per entity
 */
export function toPivotTable(view: VarianceView): PivotTableRow[] {
  return view.rows.map((row) => {
    const record: PivotTableRow = {
      [PIVOT_PERIOD_COLUMN]: row.periodKey,
      [PIVOT_MARKET_COLUMN]: row.marketVariancePct,
    };
    for (const entity of view.entities) {
      record[entity] = row.differences[entity] ?? 0;
    }
    return record;
  });
}

/**
 * Long-form cells stored by the warehouse: one market row per period plus
 * one row per (period, entity column)
 */
export function toVarianceCells(view: VarianceView): VarianceCell[] {
  const cells: VarianceCell[] = [];
  for (const row of view.rows) {
    cells.push({
      periodKey: row.periodKey,
      entityName: null,
      marketVariancePct: row.marketVariancePct,
      difference: null,
    });
    for (const entity of view.entities) {
      cells.push({
        periodKey: row.periodKey,
        entityName: entity,
        marketVariancePct: row.marketVariancePct,
        difference: row.differences[entity] ?? 0,
      });
    }
  }
  return cells;
}
