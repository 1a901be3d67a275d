import ora, { type Ora } from "ora";

import { closeConnection, db } from "../../db/connection.js";
import { KyselyWarehouseStore } from "../../db/warehouse.js";
import { RunFailure } from "../../errors.js";
import { normalizeTable } from "../../services/etl/normalizer.js";
import { PipelineOrchestrator } from "../../services/etl/orchestrator.js";
import { readExtractDirectory, readExtractFile } from "../../sources/reader.js";
import { MemoryWarehouseStore } from "../../store/memory.js";
import {
  displayDiagnostics,
  displayRecordsSample,
  displayRunFailure,
  displayRunSummary,
  displayVariancePivot,
  errorMessage,
} from "../utils/display.js";
import {
  parseMarketSeries,
  parsePositiveInt,
  resolveConfig,
  type ConfigOptions,
} from "../utils/options.js";

import type { PipelineConfig } from "../../config/index.js";
import type { WarehouseStore } from "../../store/types.js";
import type { Command } from "commander";

const DEFAULT_DATA_DIR = process.env.DATA_DIR ?? "./data/extracts";

interface RunOptions extends ConfigOptions {
  dir: string;
  freshStaging?: boolean;
  dryRun?: boolean;
}

function createStore(
  config: Readonly<PipelineConfig>,
  dryRun: boolean
): WarehouseStore {
  return dryRun
    ? new MemoryWarehouseStore()
    : new KyselyWarehouseStore(db, { chunkSize: config.staging.chunkSize });
}

function createOrchestrator(
  store: WarehouseStore,
  config: Readonly<PipelineConfig>,
  spinner: Ora
): PipelineOrchestrator {
  const orchestrator = new PipelineOrchestrator(store, config);
  orchestrator.setProgressCallback((progress) => {
    const item =
      progress.currentItem !== undefined ? ` ${progress.currentItem}` : "";
    spinner.text = `[${progress.phase}] ${String(progress.current)}/${String(progress.total)}${item}`;
  });
  return orchestrator;
}

function reportFailure(spinner: Ora, error: unknown): void {
  if (error instanceof RunFailure) {
    spinner.fail("Pipeline run failed");
    displayRunFailure(error);
  } else {
    spinner.fail(`Error: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
}

// ============================================================================
// ETL Commands
// ============================================================================

export function registerEtlCommand(program: Command): void {
  const etl = program
    .command("etl")
    .description("Load extracts and rebuild the data mart");

  // etl run
  etl
    .command("run")
    .description("Ingest every extract of a directory and consolidate")
    .option(
      "-d, --dir <dir>",
      "Directory with .csv/.ods/.xlsx/.xls extracts",
      DEFAULT_DATA_DIR
    )
    .option("--fresh-staging", "Clear staging before loading")
    .option("--dry-run", "Run against an in-memory store")
    .option(
      "--market-series <variant>",
      "Market series for the variance view (global, per-entity)",
      parseMarketSeries
    )
    .option("-c, --config <path>", "Pipeline configuration file")
    .action(async (options: RunOptions) => {
      const spinner = ora("Reading extracts...").start();

      try {
        const config = resolveConfig(options);
        const tables = await readExtractDirectory(options.dir);
        if (tables.length === 0) {
          spinner.fail(`No extracts found in ${options.dir}`);
          process.exitCode = 1;
          return;
        }

        const dryRun = options.dryRun === true;
        const store = createStore(config, dryRun);
        const orchestrator = createOrchestrator(store, config, spinner);

        const result = await orchestrator.run(tables, {
          freshStaging: options.freshStaging === true,
        });

        spinner.succeed(
          `Pipeline completed${dryRun ? " (dry run, nothing persisted)" : ""}`
        );
        displayRunSummary(result.summary);
        displayVariancePivot(result.view);
      } catch (error) {
        reportFailure(spinner, error);
      } finally {
        await closeConnection();
      }
    });

  // etl rebuild
  etl
    .command("rebuild")
    .description("Rebuild dimensions, facts and variance from staging")
    .option(
      "--market-series <variant>",
      "Market series for the variance view (global, per-entity)",
      parseMarketSeries
    )
    .option("-c, --config <path>", "Pipeline configuration file")
    .action(async (options: ConfigOptions) => {
      const spinner = ora("Consolidating staging...").start();

      try {
        const config = resolveConfig(options);
        const orchestrator = createOrchestrator(
          createStore(config, false),
          config,
          spinner
        );

        const result = await orchestrator.consolidate();
        spinner.succeed("Rebuild completed");
        displayRunSummary(result.summary);
        displayVariancePivot(result.view);
      } catch (error) {
        reportFailure(spinner, error);
      } finally {
        await closeConnection();
      }
    });

  // etl preview
  etl
    .command("preview <file>")
    .description("Normalize one extract and show what would be staged")
    .option("-n, --limit <n>", "Records to show", parsePositiveInt, 20)
    .option("-c, --config <path>", "Pipeline configuration file")
    .action(
      async (file: string, options: { limit: number; config?: string }) => {
        const spinner = ora(`Reading ${file}...`).start();

        try {
          const config = resolveConfig(options);
          const table = await readExtractFile(file);
          const { records, diagnostics } = normalizeTable(
            table,
            config.normalizer
          );
          spinner.succeed(
            `${table.source}: ${String(records.length)} records (service ${table.serviceCode})`
          );

          displayDiagnostics(diagnostics);
          if (records.length > 0) {
            console.log();
            displayRecordsSample(records, options.limit);
          }
        } catch (error) {
          spinner.fail(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );
}
