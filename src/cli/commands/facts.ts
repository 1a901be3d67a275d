import ora from "ora";

import { closeConnection, db } from "../../db/connection.js";
import { KyselyWarehouseStore } from "../../db/warehouse.js";
import { displayFactsTable, errorMessage } from "../utils/display.js";
import { parsePositiveInt } from "../utils/options.js";

import type { FactFilter } from "../../types/index.js";
import type { Command } from "commander";

interface ListOptions {
  period?: string;
  from?: string;
  to?: string;
  entity?: string;
  service?: string;
  limit: number;
}

export function toFactFilter(options: ListOptions): FactFilter {
  const filter: FactFilter = { limit: options.limit };
  const from = options.period ?? options.from;
  const to = options.period ?? options.to;
  if (from !== undefined) filter.periodFrom = from;
  if (to !== undefined) filter.periodTo = to;
  if (options.entity !== undefined) {
    filter.entityName = options.entity.toUpperCase();
  }
  if (options.service !== undefined) filter.serviceCode = options.service;
  return filter;
}

// ============================================================================
// Fact Commands
// ============================================================================

export function registerFactsCommand(program: Command): void {
  const facts = program.command("facts").description("Inspect fact rows");

  // facts list
  facts
    .command("list")
    .description("List fact rows")
    .option("-p, --period <key>", "Single period (YYYY-MM)")
    .option("--from <key>", "First period (YYYY-MM)")
    .option("--to <key>", "Last period (YYYY-MM)")
    .option("-e, --entity <name>", "Canonical entity name")
    .option("-s, --service <code>", "Service code (SMP, STFC, SCM)")
    .option("-l, --limit <n>", "Maximum rows", parsePositiveInt, 100)
    .action(async (options: ListOptions) => {
      const spinner = ora("Loading facts...").start();

      try {
        const rows = await new KyselyWarehouseStore(db).listFacts(
          toFactFilter(options)
        );
        spinner.succeed(`${String(rows.length)} fact rows`);
        if (rows.length > 0) {
          displayFactsTable(rows);
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
