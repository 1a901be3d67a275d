import { InvalidArgumentError } from "commander";

import {
  isMarketSeriesVariant,
  loadPipelineConfig,
  withMarketSeries,
  type PipelineConfig,
} from "../../config/index.js";

import type { MarketSeriesVariant } from "../../types/index.js";

export interface ConfigOptions {
  config?: string;
  marketSeries?: MarketSeriesVariant;
}

/**
 * commander argument parser for --market-series
 */
export function parseMarketSeries(value: string): MarketSeriesVariant {
  if (!isMarketSeriesVariant(value)) {
    throw new InvalidArgumentError('Expected "global" or "per-entity".');
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Pipeline configuration with the command line overrides applied
 */
export function resolveConfig(
  options: ConfigOptions
): Readonly<PipelineConfig> {
  return withMarketSeries(
    loadPipelineConfig(options.config),
    options.marketSeries
  );
}
