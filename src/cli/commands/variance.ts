import ora from "ora";

import { closeConnection, db } from "../../db/connection.js";
import { KyselyWarehouseStore } from "../../db/warehouse.js";
import {
  loadVarianceView,
  toPivotTable,
} from "../../services/etl/variance.js";
import { displayVariancePivot, errorMessage } from "../utils/display.js";
import {
  parseMarketSeries,
  resolveConfig,
  type ConfigOptions,
} from "../utils/options.js";

import type { Command } from "commander";

interface ShowOptions extends ConfigOptions {
  json?: boolean;
  long?: boolean;
}

// ============================================================================
// Variance Commands
// ============================================================================

export function registerVarianceCommand(program: Command): void {
  const variance = program
    .command("variance")
    .description("Market vs entity variance of the 5-day resolution rate");

  // variance show
  variance
    .command("show")
    .description("Compute the variance pivot from the current facts")
    .option(
      "--market-series <variant>",
      "Market series (global, per-entity)",
      parseMarketSeries
    )
    .option("--json", "Print the pivot rows as JSON")
    .option("--long", "Print the long-form deltas as JSON")
    .option("-c, --config <path>", "Pipeline configuration file")
    .action(async (options: ShowOptions) => {
      const spinner = ora("Computing variance...").start();

      try {
        const config = resolveConfig(options);
        const store = new KyselyWarehouseStore(db);
        const view = await loadVarianceView(store, {
          marketSeries: config.variance.marketSeries,
        });
        spinner.stop();

        if (options.long === true) {
          console.log(JSON.stringify(view.deltas, null, 2));
        } else if (options.json === true) {
          console.log(JSON.stringify(toPivotTable(view), null, 2));
        } else {
          displayVariancePivot(view);
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
