/**
 * ETL Services
 *
 * Layers:
 * 1. Normalize - wide extract tables to long observation records
 * 2. Canonical - period labels and entity group names
 * 3. Consolidate - dimensions, facts and the variance view
 */

// Canonical layer
export {
  canonicalizeEntity,
  cleanEntityLabel,
  createEntityCanonicalizer,
} from "./canonical/entities.js";
export type { EntityCanonicalizer } from "./canonical/entities.js";
export {
  findPeriodToken,
  formatPeriodKey,
  parsePeriodKey,
  parsePeriodLabel,
  toPeriodRow,
} from "./canonical/periods.js";

// Stages
export { normalizeTable, parseNumericCell } from "./normalizer.js";
export type { NormalizeDiagnostics, NormalizeResult } from "./normalizer.js";
export { consolidateDimensions, planDimensions } from "./dimensions.js";
export { buildFacts, resolveSynonym } from "./facts.js";
export type { FactBuildResult, FactWarning } from "./facts.js";
export {
  buildVarianceView,
  loadVarianceView,
  toPivotTable,
} from "./variance.js";

// Orchestration
export { PipelineOrchestrator } from "./orchestrator.js";
export type {
  IngestOptions,
  PipelineProgress,
  RunResult,
} from "./orchestrator.js";
