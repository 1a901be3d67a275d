/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { formatPeriodKey } from "../../services/etl/canonical/periods.js";
import {
  PIVOT_MARKET_COLUMN,
  PIVOT_PERIOD_COLUMN,
  toPivotTable,
} from "../../services/etl/variance.js";

import type { RunFailure, RunSummary } from "../../errors.js";
import type { NormalizeDiagnostics } from "../../services/etl/normalizer.js";
import type { TableCounts } from "../../store/types.js";
import type {
  FactMetric,
  ObservationRecord,
  VarianceView,
} from "../../types/index.js";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatSigned(value: number): string {
  const text = value.toFixed(1);
  if (value > 0) return chalk.green(`+${text}`);
  if (value < 0) return chalk.red(text);
  return chalk.gray(text);
}

/**
 * Display the counters of a pipeline run
 */
export function displayRunSummary(summary: RunSummary): void {
  const table = new CliTable3({
    head: [chalk.cyan("Step"), chalk.cyan("Count")],
    colWidths: [28, 12],
  });

  table.push(
    ["Files processed", String(summary.filesProcessed)],
    ["Records normalized", String(summary.recordsNormalized)],
    ["Records staged", String(summary.recordsStaged)],
    ["Cells skipped", String(summary.skippedCells)],
    ["Columns skipped", String(summary.skippedColumns)],
    ["Periods inserted", String(summary.periodsInserted)],
    ["Entities inserted", String(summary.entitiesInserted)],
    ["Services inserted", String(summary.servicesInserted)],
    ["Facts built", String(summary.factsBuilt)],
    ["Unlabeled records", String(summary.unlabeledRecords)],
    ["Inconsistent facts", String(summary.inconsistentFacts)],
    ["Variance rows", String(summary.varianceRows)]
  );

  console.log(chalk.bold("\nRun summary:\n"));
  console.log(table.toString());

  if (summary.emptyInputs.length > 0) {
    console.log(chalk.yellow("\nExtracts without records:"));
    for (const input of summary.emptyInputs) {
      console.log(
        `  ${input.source} ${chalk.gray(`(${String(input.skippedColumns)} columns, ${String(input.skippedCells)} cells skipped)`)}`
      );
    }
  }
}

/**
 * Display a RunFailure with the partial summary it carries
 */
export function displayRunFailure(error: RunFailure): void {
  console.error(chalk.red(`\nRun failed (${error.reason}): ${error.message}`));
  displayRunSummary(error.summary);
}

/**
 * Display normalizer diagnostics for one extract
 */
export function displayDiagnostics(diagnostics: NormalizeDiagnostics): void {
  console.log(chalk.bold.underline(`\nExtract: ${diagnostics.source}\n`));
  console.log(`  Header row:      ${String(diagnostics.headerRow + 1)}`);
  console.log(
    `  Table period:    ${
      diagnostics.tablePeriod !== null
        ? formatPeriodKey(
            diagnostics.tablePeriod.year,
            diagnostics.tablePeriod.month
          )
        : chalk.gray("none")
    }`
  );
  console.log(`  Value columns:   ${String(diagnostics.periodColumns)}`);
  console.log(`  Records:         ${String(diagnostics.recordCount)}`);
  console.log(`  Skipped cells:   ${String(diagnostics.skippedCells)}`);

  if (diagnostics.skippedColumns.length > 0) {
    const table = new CliTable3({
      head: [chalk.cyan("#"), chalk.cyan("Header"), chalk.cyan("Reason")],
      colWidths: [6, 50, 20],
      wordWrap: true,
    });
    for (const skip of diagnostics.skippedColumns) {
      table.push([
        String(skip.index + 1),
        skip.header,
        chalk.yellow(skip.reason),
      ]);
    }
    console.log(chalk.bold("\nSkipped columns:"));
    console.log(table.toString());
  }
}

/**
 * Display the first records of a normalized extract
 */
export function displayRecordsSample(
  records: readonly ObservationRecord[],
  limit = 20
): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Period"),
      chalk.cyan("Service"),
      chalk.cyan("Entity"),
      chalk.cyan("Variable"),
      chalk.cyan("Value"),
    ],
    colWidths: [10, 9, 28, 45, 12],
    wordWrap: true,
  });

  for (const record of records.slice(0, limit)) {
    table.push([
      record.periodKey,
      record.serviceCode,
      record.entityRaw,
      record.variableName,
      String(record.value),
    ]);
  }

  console.log(table.toString());
  if (records.length > limit) {
    console.log(
      chalk.gray(`... ${String(records.length - limit)} more records`)
    );
  }
}

/**
 * Display the variance pivot: one row per period, one column per entity
 */
export function displayVariancePivot(view: VarianceView): void {
  if (view.rows.length === 0) {
    console.log(
      chalk.yellow("\nNo variance rows (fewer than two periods of data)")
    );
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Period"),
      chalk.cyan("Market"),
      ...view.entities.map((entity) => chalk.cyan(entity)),
    ],
  });

  for (const row of toPivotTable(view)) {
    const cells = [PIVOT_MARKET_COLUMN, ...view.entities].map((column) => {
      const value = row[column];
      return typeof value === "number" ? formatSigned(value) : "";
    });
    table.push([String(row[PIVOT_PERIOD_COLUMN] ?? ""), ...cells]);
  }

  console.log(
    chalk.bold(
      `\nMarket vs entity variance (${view.marketSeries} market series):\n`
    )
  );
  console.log(table.toString());
  console.log(
    chalk.gray(
      "Cells show market change minus entity change, in percentage points"
    )
  );
}

/**
 * Display fact rows in a formatted table
 */
export function displayFactsTable(facts: readonly FactMetric[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Period"),
      chalk.cyan("Entity"),
      chalk.cyan("Service"),
      chalk.cyan("5d %"),
      chalk.cyan("Total %"),
      chalk.cyan("Requests"),
      chalk.cyan("Resolved"),
    ],
  });

  for (const fact of facts) {
    table.push([
      fact.periodKey,
      chalk.green(fact.entityName),
      fact.serviceCode,
      fact.rateResolved5d.toFixed(2),
      fact.rateResolvedTotal.toFixed(2),
      String(fact.totalRequests),
      String(fact.resolvedRequests),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display row counts per warehouse table
 */
export function displayTableCounts(counts: TableCounts): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
    colWidths: [24, 12],
  });

  table.push(
    ["staging_observations", String(counts.staging)],
    ["dim_periods", String(counts.periods)],
    ["dim_entities", String(counts.entities)],
    ["dim_services", String(counts.services)],
    ["fact_metrics", String(counts.facts)],
    ["variance_cells", String(counts.varianceCells)]
  );

  console.log(table.toString());
}
