/**
 * Pipeline configuration
 *
 * Rule tables (entity canonicalization, metric synonyms, service seeds)
 * live in config/pipeline.json. They are validated once, frozen, and then
 * passed explicitly into each stage; no stage reads process state.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "../errors.js";
import { canonicalizeEntity } from "../services/etl/canonical/entities.js";

import type { MarketSeriesVariant } from "../types/index.js";

// ============================================================================
// Schema
// ============================================================================

const NonEmptyString = Type.String({ minLength: 1 });

export const VariableMatcherSchema = Type.Object({
  label: NonEmptyString,
  match: Type.Union([Type.Literal("exact"), Type.Literal("prefix")]),
});

export const EntityRuleSchema = Type.Object({
  group: NonEmptyString,
  prefixes: Type.Array(NonEmptyString, { minItems: 1 }),
});

export const MarketSeriesSchema = Type.Union([
  Type.Literal("global"),
  Type.Literal("per-entity"),
]);

export const PipelineConfigSchema = Type.Object({
  normalizer: Type.Object({
    entityHeaders: Type.Array(NonEmptyString, { minItems: 1 }),
    variableHeaders: Type.Array(NonEmptyString),
    periodMarkers: Type.Array(NonEmptyString),
    dropNegativeValues: Type.Boolean(),
  }),
  canonicalization: Type.Object({
    rules: Type.Array(EntityRuleSchema),
  }),
  metrics: Type.Object({
    rateResolved5d: Type.Array(VariableMatcherSchema, { minItems: 1 }),
    rateResolvedTotal: Type.Array(VariableMatcherSchema, { minItems: 1 }),
    totalRequests: Type.Array(VariableMatcherSchema, { minItems: 1 }),
    resolvedRequests: Type.Array(VariableMatcherSchema),
  }),
  services: Type.Array(
    Type.Object({
      code: NonEmptyString,
      displayName: NonEmptyString,
      category: NonEmptyString,
    })
  ),
  variance: Type.Object({
    marketSeries: MarketSeriesSchema,
  }),
  staging: Type.Object({
    chunkSize: Type.Integer({ minimum: 1, maximum: 10_000 }),
  }),
});

export type PipelineConfig = Static<typeof PipelineConfigSchema>;
export type VariableMatcher = Static<typeof VariableMatcherSchema>;
export type EntityRule = Static<typeof EntityRuleSchema>;
export type NormalizerConfig = PipelineConfig["normalizer"];
export type MetricSynonyms = PipelineConfig["metrics"];

// ============================================================================
// Loading
// ============================================================================

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL("../../config/pipeline.json", import.meta.url)
);

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a parsed JSON document into a frozen PipelineConfig
 */
export function parsePipelineConfig(raw: unknown): Readonly<PipelineConfig> {
  if (!Value.Check(PipelineConfigSchema, raw)) {
    const issues = [...Value.Errors(PipelineConfigSchema, raw)].map(
      (error) => `${error.path || "/"}: ${error.message}`
    );
    throw new ConfigError("Invalid pipeline configuration", issues);
  }

  // A group name has to canonicalize to itself, otherwise canonicalize()
  // would not be idempotent
  const rules = raw.canonicalization.rules;
  const unstable = rules
    .filter((rule) => canonicalizeEntity(rule.group, rules) !== rule.group)
    .map(
      (rule) =>
        `/canonicalization/rules: group "${rule.group}" canonicalizes to "${canonicalizeEntity(rule.group, rules)}"`
    );
  if (unstable.length > 0) {
    throw new ConfigError("Invalid pipeline configuration", unstable);
  }

  return deepFreeze(structuredClone(raw));
}

/**
 * Load the pipeline configuration from disk.
 * Resolution order: explicit path, PIPELINE_CONFIG, bundled config/pipeline.json.
 */
export function loadPipelineConfig(path?: string): Readonly<PipelineConfig> {
  const configPath =
    path ?? process.env.PIPELINE_CONFIG ?? DEFAULT_CONFIG_PATH;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot read pipeline configuration at ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parsePipelineConfig(parsed);
}

/**
 * Copy of the configuration with a different market-series variant
 */
export function withMarketSeries(
  config: Readonly<PipelineConfig>,
  marketSeries: MarketSeriesVariant | undefined
): Readonly<PipelineConfig> {
  if (
    marketSeries === undefined ||
    marketSeries === config.variance.marketSeries
  ) {
    return config;
  }
  return deepFreeze({
    ...structuredClone(config),
    variance: { marketSeries },
  });
}

export function isMarketSeriesVariant(
  value: string
): value is MarketSeriesVariant {
  return value === "global" || value === "per-entity";
}
