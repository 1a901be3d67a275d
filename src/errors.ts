/**
 * Pipeline error taxonomy
 *
 * Cell and column problems never throw: the normalizer records them as
 * skips in its diagnostics, and empty inputs are reported in the run
 * summary. Only run-level problems surface as exceptions.
 */

// ============================================================================
// Recoverable diagnostics
// ============================================================================

export type ParseSkipReason =
  | "invalid-period"
  | "no-period"
  | "missing-variable"
  | "empty-header";

export interface ParseSkip {
  header: string;
  index: number;
  reason: ParseSkipReason;
}

export interface EmptyInputWarning {
  source: string;
  skippedColumns: number;
  skippedCells: number;
}

// ============================================================================
// Fatal errors
// ============================================================================

export interface MissingDimensionKeys {
  periods: string[];
  entities: string[];
  services: string[];
}

export class ReferentialError extends Error {
  code = "REFERENTIAL_ERROR" as const;
  missing: MissingDimensionKeys;

  constructor(missing: MissingDimensionKeys) {
    const parts = [
      missing.periods.length > 0
        ? `periods [${missing.periods.join(", ")}]`
        : null,
      missing.entities.length > 0
        ? `entities [${missing.entities.join(", ")}]`
        : null,
      missing.services.length > 0
        ? `services [${missing.services.join(", ")}]`
        : null,
    ].filter((part): part is string => part !== null);

    super(`Staging references unknown dimension keys: ${parts.join("; ")}`);
    this.name = "ReferentialError";
    this.missing = missing;
  }
}

export type RunFailureReason =
  | "NO_RECORDS"
  | "NO_FACTS"
  | "STORAGE"
  | "REFERENTIAL";

export interface RunSummary {
  filesProcessed: number;
  emptyInputs: EmptyInputWarning[];
  recordsNormalized: number;
  recordsStaged: number;
  skippedCells: number;
  skippedColumns: number;
  periodsInserted: number;
  entitiesInserted: number;
  servicesInserted: number;
  factsBuilt: number;
  unlabeledRecords: number;
  inconsistentFacts: number;
  varianceRows: number;
}

export function emptyRunSummary(): RunSummary {
  return {
    filesProcessed: 0,
    emptyInputs: [],
    recordsNormalized: 0,
    recordsStaged: 0,
    skippedCells: 0,
    skippedColumns: 0,
    periodsInserted: 0,
    entitiesInserted: 0,
    servicesInserted: 0,
    factsBuilt: 0,
    unlabeledRecords: 0,
    inconsistentFacts: 0,
    varianceRows: 0,
  };
}

export class RunFailure extends Error {
  code = "RUN_FAILURE" as const;
  reason: RunFailureReason;
  summary: RunSummary;

  constructor(
    reason: RunFailureReason,
    message: string,
    summary: RunSummary,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RunFailure";
    this.reason = reason;
    this.summary = summary;
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}
