/**
 * Record Normalizer - wide spreadsheet extract to long observations
 *
 * Extract layouts vary from file to file. A sheet may open with a preamble
 * ("PERÍODO: OUT/2015"), then a header row whose columns are:
 * - the entity column ("GRUPO ECONÔMICO")
 * - an optional variable column ("VARIÁVEL"), when each row is one metric
 * - period columns ("2015-01"), read together with the variable column
 * - compound columns ("2015-01 Taxa de Resolvidas em 5 dias")
 * - variable-only columns ("Taxa de Resolvidas em 5 dias"), read with the
 *   sheet-level period
 *
 * Every non-empty numeric cell under a usable column becomes one
 * ObservationRecord. Entity labels are passed through untouched; grouping
 * happens later in the canonicalizer.
 */

import { findPeriodToken, formatPeriodKey } from "./canonical/periods.js";

import type { NormalizerConfig } from "../../config/index.js";
import type { ParseSkip } from "../../errors.js";
import type {
  ObservationRecord,
  RawCell,
  RawTable,
  YearMonth,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

type ColumnPlan =
  | { kind: "entity"; index: number }
  | { kind: "variable"; index: number }
  | {
      kind: "value";
      index: number;
      period: YearMonth | null;
      variable: string | null;
    };

export interface NormalizeDiagnostics {
  source: string;
  recordCount: number;
  /** Value columns that carry a usable period */
  periodColumns: number;
  skippedCells: number;
  skippedColumns: ParseSkip[];
  headerRow: number;
  tablePeriod: YearMonth | null;
}

export interface NormalizeResult {
  records: ObservationRecord[];
  diagnostics: NormalizeDiagnostics;
}

// ============================================================================
// Cell helpers
// ============================================================================

export function cellText(cell: RawCell | undefined): string {
  if (cell === null || cell === undefined) return "";
  return String(cell);
}

function headerMatches(text: string, candidates: readonly string[]): boolean {
  const upper = text.trim().toUpperCase();
  return (
    upper !== "" &&
    candidates.some((candidate) => upper.startsWith(candidate.toUpperCase()))
  );
}

function headerEquals(text: string, candidates: readonly string[]): boolean {
  const upper = text.trim().toUpperCase();
  return candidates.some((candidate) => upper === candidate.toUpperCase());
}

/**
 * Parse a cell into a number, or null when it holds no numeric value.
 * Accepts "87,5", "1.234,5", "12.5 %" and plain numbers; zero is kept.
 */
export function parseNumericCell(cell: RawCell | undefined): number | null {
  if (cell === null || cell === undefined || typeof cell === "boolean") {
    return null;
  }
  if (typeof cell === "number") {
    return Number.isFinite(cell) ? cell : null;
  }

  let text = cell.replace(/%/g, "").replace(/\s+/g, "");
  if (text === "" || text === "-") {
    return null;
  }
  if (text.includes(",")) {
    text = text.replace(/\./g, "").replace(",", ".");
  }
  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(text)) {
    return null;
  }

  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

// ============================================================================
// Layout detection
// ============================================================================

function findHeaderRow(rows: RawCell[][], config: NormalizerConfig): number {
  const index = rows.findIndex((row) =>
    row.some((cell) => headerMatches(cellText(cell), config.entityHeaders))
  );
  return index >= 0 ? index : 0;
}

function findTablePeriod(
  preamble: RawCell[][],
  config: NormalizerConfig,
  defaultYear: number | undefined
): YearMonth | null {
  for (const row of preamble) {
    const line = row.map(cellText).join(" ");
    const upper = line.toUpperCase();
    if (
      !config.periodMarkers.some((marker) =>
        upper.includes(marker.toUpperCase())
      )
    ) {
      continue;
    }
    const match = findPeriodToken(line, defaultYear);
    if (match.kind === "period") {
      return { year: match.year, month: match.month };
    }
  }
  return null;
}

function planColumns(
  header: RawCell[],
  config: NormalizerConfig,
  defaultYear: number | undefined,
  skipped: ParseSkip[]
): ColumnPlan[] {
  const plans: ColumnPlan[] = [];
  let entityIndex = header.findIndex((cell) =>
    headerMatches(cellText(cell), config.entityHeaders)
  );
  if (entityIndex < 0) entityIndex = 0;

  for (const [index, cell] of header.entries()) {
    const text = cellText(cell).trim();

    if (index === entityIndex) {
      plans.push({ kind: "entity", index });
      continue;
    }
    if (text === "") {
      skipped.push({ header: text, index, reason: "empty-header" });
      continue;
    }
    if (headerEquals(text, config.variableHeaders)) {
      plans.push({ kind: "variable", index });
      continue;
    }

    const match = findPeriodToken(text, defaultYear);
    if (match.kind === "invalid") {
      skipped.push({ header: text, index, reason: "invalid-period" });
    } else if (match.kind === "period") {
      plans.push({
        kind: "value",
        index,
        period: { year: match.year, month: match.month },
        variable: match.rest === "" ? null : match.rest,
      });
    } else {
      plans.push({ kind: "value", index, period: null, variable: text });
    }
  }

  return plans;
}

// ============================================================================
// Normalizer
// ============================================================================

/**
 * Reshape one raw wide table into long-format observation records
 */
export function normalizeTable(
  table: RawTable,
  config: NormalizerConfig
): NormalizeResult {
  const headerRow = findHeaderRow(table.rows, config);
  const header = table.rows[headerRow] ?? [];
  const tablePeriod =
    table.period ??
    findTablePeriod(table.rows.slice(0, headerRow), config, table.defaultYear);

  const skippedColumns: ParseSkip[] = [];
  const plans = planColumns(header, config, table.defaultYear, skippedColumns);

  const entityPlan = plans.find((plan) => plan.kind === "entity");
  const variablePlan = plans.find((plan) => plan.kind === "variable");

  // Resolve each value column to a (period, variable source) pair
  const valueColumns: {
    index: number;
    period: YearMonth;
    variable: string | null;
  }[] = [];
  for (const plan of plans) {
    if (plan.kind !== "value") continue;
    const label = cellText(header[plan.index]).trim();
    const period = plan.period ?? tablePeriod;

    if (period === null) {
      skippedColumns.push({
        header: label,
        index: plan.index,
        reason: "no-period",
      });
    } else if (plan.variable === null && variablePlan === undefined) {
      skippedColumns.push({
        header: label,
        index: plan.index,
        reason: "missing-variable",
      });
    } else {
      valueColumns.push({ index: plan.index, period, variable: plan.variable });
    }
  }

  const serviceCode = table.serviceCode.trim().toUpperCase();
  const records: ObservationRecord[] = [];
  let skippedCells = 0;

  for (const row of table.rows.slice(headerRow + 1)) {
    const entityRaw = cellText(row[entityPlan?.index ?? 0]);
    if (entityRaw.trim() === "") continue;

    const rowVariable =
      variablePlan !== undefined ? cellText(row[variablePlan.index]).trim() : "";

    for (const column of valueColumns) {
      const variableName = column.variable ?? rowVariable;
      const value = parseNumericCell(row[column.index]);

      if (variableName === "" || value === null) {
        skippedCells++;
        continue;
      }
      if (config.dropNegativeValues && value < 0) {
        skippedCells++;
        continue;
      }

      records.push({
        periodYear: column.period.year,
        periodMonth: column.period.month,
        periodKey: formatPeriodKey(column.period.year, column.period.month),
        serviceCode,
        entityRaw,
        variableName,
        value,
        sourceFile: table.source,
      });
    }
  }

  return {
    records,
    diagnostics: {
      source: table.source,
      recordCount: records.length,
      periodColumns: valueColumns.length,
      skippedCells,
      skippedColumns: skippedColumns.sort((a, b) => a.index - b.index),
      headerRow,
      tablePeriod,
    },
  };
}
