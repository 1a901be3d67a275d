import {
  ReferentialError,
  RunFailure,
  emptyRunSummary,
  type EmptyInputWarning,
  type RunFailureReason,
  type RunSummary,
} from "../../errors.js";
import { etlLogger as logger } from "../../logger.js";
import { createEntityCanonicalizer } from "./canonical/entities.js";
import { consolidateDimensions } from "./dimensions.js";
import { buildFacts, type FactWarning } from "./facts.js";
import { normalizeTable, type NormalizeDiagnostics } from "./normalizer.js";
import { loadVarianceView } from "./variance.js";

import type { PipelineConfig } from "../../config/index.js";
import type { WarehouseStore } from "../../store/types.js";
import type { RawTable, VarianceView } from "../../types/index.js";
import type { EntityCanonicalizer } from "./canonical/entities.js";

// ============================================================================
// Types
// ============================================================================

export interface IngestOptions {
  /** Truncate staging before loading */
  freshStaging?: boolean;
}

export interface PipelineProgress {
  phase: "normalize" | "stage" | "dimensions" | "facts" | "variance";
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: PipelineProgress) => void;

export interface IngestResult {
  summary: RunSummary;
  diagnostics: NormalizeDiagnostics[];
}

export interface ConsolidateResult {
  summary: RunSummary;
  warnings: FactWarning[];
  view: VarianceView;
}

export interface RunResult extends ConsolidateResult {
  diagnostics: NormalizeDiagnostics[];
}

// ============================================================================
// Pipeline Orchestrator
// ============================================================================

/**
 * Runs the ETL stages against a WarehouseStore:
 * normalize -> stage -> dimensions -> facts -> variance
 */
export class PipelineOrchestrator {
  private readonly canonicalize: EntityCanonicalizer;
  private onProgress?: ProgressCallback;

  constructor(
    private readonly store: WarehouseStore,
    private readonly config: Readonly<PipelineConfig>
  ) {
    this.canonicalize = createEntityCanonicalizer(
      config.canonicalization.rules
    );
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Normalize raw tables and append the records to staging
   */
  async ingest(
    tables: readonly RawTable[],
    options: IngestOptions = {},
    summary: RunSummary = emptyRunSummary()
  ): Promise<IngestResult> {
    const diagnostics: NormalizeDiagnostics[] = [];

    if (options.freshStaging === true) {
      await this.guardStorage(summary, "Failed to clear staging", () =>
        this.store.clearStaging()
      );
      logger.info("Staging cleared");
    }

    for (const [index, table] of tables.entries()) {
      this.onProgress?.({
        phase: "normalize",
        current: index + 1,
        total: tables.length,
        currentItem: table.source,
      });

      const { records, diagnostics: tableDiagnostics } = normalizeTable(
        table,
        this.config.normalizer
      );
      diagnostics.push(tableDiagnostics);

      summary.filesProcessed++;
      summary.recordsNormalized += records.length;
      summary.skippedCells += tableDiagnostics.skippedCells;
      summary.skippedColumns += tableDiagnostics.skippedColumns.length;

      for (const skip of tableDiagnostics.skippedColumns) {
        logger.debug({ source: table.source, ...skip }, "Column skipped");
      }

      if (records.length === 0) {
        const warning: EmptyInputWarning = {
          source: table.source,
          skippedColumns: tableDiagnostics.skippedColumns.length,
          skippedCells: tableDiagnostics.skippedCells,
        };
        summary.emptyInputs.push(warning);
        logger.warn(warning, "Extract produced no records");
        continue;
      }

      this.onProgress?.({
        phase: "stage",
        current: index + 1,
        total: tables.length,
        currentItem: table.source,
      });
      summary.recordsStaged += await this.guardStorage(
        summary,
        `Failed to stage records from ${table.source}`,
        () => this.store.appendRecords(records)
      );

      logger.info(
        {
          source: table.source,
          records: records.length,
          skippedCells: tableDiagnostics.skippedCells,
          skippedColumns: tableDiagnostics.skippedColumns.length,
        },
        "Extract staged"
      );
    }

    return { summary, diagnostics };
  }

  /**
   * Rebuild dimensions, facts and the variance view from staging
   */
  async consolidate(
    summary: RunSummary = emptyRunSummary()
  ): Promise<ConsolidateResult> {
    const staging = await this.guardStorage(
      summary,
      "Failed to read staging",
      () => this.store.listStaging()
    );
    if (staging.length === 0) {
      throw this.fail("NO_RECORDS", "Staging holds no records", summary);
    }

    this.onProgress?.({ phase: "dimensions", current: 1, total: 3 });
    const { snapshot, inserted } = await this.guardStorage(
      summary,
      "Failed to consolidate dimensions",
      () =>
        consolidateDimensions(this.store, staging, {
          canonicalize: this.canonicalize,
          services: this.config.services,
        })
    );
    summary.periodsInserted = inserted.periods;
    summary.entitiesInserted = inserted.entities;
    summary.servicesInserted = inserted.services;
    logger.info(inserted, "Dimensions consolidated");

    this.onProgress?.({ phase: "facts", current: 2, total: 3 });
    let built: ReturnType<typeof buildFacts>;
    try {
      built = buildFacts(staging, snapshot, {
        canonicalize: this.canonicalize,
        metrics: this.config.metrics,
      });
    } catch (error) {
      if (error instanceof ReferentialError) {
        throw this.fail("REFERENTIAL", error.message, summary, error);
      }
      throw error;
    }

    summary.factsBuilt = built.facts.length;
    summary.unlabeledRecords = built.unlabeledRecords;
    summary.inconsistentFacts = built.warnings.length;
    if (built.unlabeledRecords > 0) {
      logger.warn(
        { records: built.unlabeledRecords },
        "Staging records without an entity label skipped"
      );
    }
    for (const warning of built.warnings) {
      logger.warn(warning, "Inconsistent request counts");
    }
    if (built.facts.length === 0) {
      throw this.fail("NO_FACTS", "No fact rows could be built", summary);
    }

    await this.guardStorage(summary, "Failed to replace facts", () =>
      this.store.replaceFacts(built.facts)
    );
    logger.info({ facts: built.facts.length }, "Facts replaced");

    this.onProgress?.({ phase: "variance", current: 3, total: 3 });
    const view = await this.buildVariance(summary);

    return { summary, warnings: built.warnings, view };
  }

  /**
   * Full run: ingest the given tables, then consolidate
   */
  async run(
    tables: readonly RawTable[],
    options: IngestOptions = {}
  ): Promise<RunResult> {
    const startTime = Date.now();
    const { summary, diagnostics } = await this.ingest(tables, options);
    if (summary.recordsNormalized === 0) {
      throw this.fail(
        "NO_RECORDS",
        `No records normalized from ${String(tables.length)} extract(s)`,
        summary
      );
    }
    const result = await this.consolidate(summary);

    logger.info(
      {
        ...summary,
        emptyInputs: summary.emptyInputs.length,
        duration: Date.now() - startTime,
      },
      "Pipeline run completed"
    );
    return { ...result, diagnostics };
  }

  /**
   * Compute the variance view from the stored facts and materialize it
   */
  async buildVariance(
    summary: RunSummary = emptyRunSummary()
  ): Promise<VarianceView> {
    const { marketSeries } = this.config.variance;
    const view = await this.guardStorage(
      summary,
      "Failed to read facts for the variance view",
      () => loadVarianceView(this.store, { marketSeries })
    );
    summary.varianceRows = view.rows.length;
    logger.info(
      { marketSeries, rows: view.rows.length, columns: view.entities.length },
      "Variance view built"
    );

    await this.guardStorage(summary, "Failed to materialize variance", () =>
      this.store.materializeVariance(view)
    );
    return view;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private fail(
    reason: RunFailureReason,
    message: string,
    summary: RunSummary,
    cause?: unknown
  ): RunFailure {
    logger.error({ reason, summary }, message);
    return new RunFailure(
      reason,
      message,
      summary,
      cause === undefined ? undefined : { cause }
    );
  }

  /**
   * Run a store operation, wrapping its failure into RunFailure("STORAGE")
   */
  private async guardStorage<T>(
    summary: RunSummary,
    message: string,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof RunFailure) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw this.fail("STORAGE", `${message}: ${detail}`, summary, error);
    }
  }
}
