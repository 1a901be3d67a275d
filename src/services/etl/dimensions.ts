/**
 * Dimension Consolidator
 *
 * Derives the Period, Entity and Service dimension rows implied by the
 * staging contents and inserts those that are not there yet. Existing rows
 * are never touched.
 */

import { toPeriodRow } from "./canonical/periods.js";

import type { PipelineConfig } from "../../config/index.js";
import type { WarehouseStore } from "../../store/types.js";
import type {
  DimensionSnapshot,
  EntityRow,
  ObservationRecord,
  PeriodRow,
  ServiceRow,
} from "../../types/index.js";
import type { EntityCanonicalizer } from "./canonical/entities.js";

export const UNKNOWN_SERVICE_CATEGORY = "Other";

export interface DimensionOptions {
  canonicalize: EntityCanonicalizer;
  services: PipelineConfig["services"];
}

export interface DimensionPlan {
  periods: PeriodRow[];
  entities: EntityRow[];
  services: ServiceRow[];
}

export interface ConsolidationResult {
  snapshot: DimensionSnapshot;
  inserted: {
    periods: number;
    entities: number;
    services: number;
  };
}

function byKey<T>(key: (row: T) => string): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    if (left < right) return -1;
    return left > right ? 1 : 0;
  };
}

/**
 * Compute the dimension rows to insert: every key referenced by staging
 * (plus the configured service seeds) that `existing` lacks.
 */
export function planDimensions(
  staging: readonly ObservationRecord[],
  existing: DimensionSnapshot,
  options: DimensionOptions
): DimensionPlan {
  const knownPeriods = new Set(existing.periods.map((row) => row.periodKey));
  const knownEntities = new Set(
    existing.entities.map((row) => row.canonicalName)
  );
  const knownServices = new Set(existing.services.map((row) => row.code));

  const periods = new Map<string, PeriodRow>();
  const entities = new Map<string, EntityRow>();
  const services = new Map<string, ServiceRow>();

  for (const seed of options.services) {
    const code = seed.code.trim().toUpperCase();
    if (!knownServices.has(code)) {
      services.set(code, { ...seed, code });
    }
  }

  for (const record of staging) {
    if (!knownPeriods.has(record.periodKey)) {
      const row = toPeriodRow(record.periodYear, record.periodMonth);
      periods.set(row.periodKey, row);
    }

    const canonicalName = options.canonicalize(record.entityRaw);
    if (canonicalName !== "" && !knownEntities.has(canonicalName)) {
      entities.set(canonicalName, { canonicalName, active: true });
    }

    const code = record.serviceCode.trim().toUpperCase();
    if (code !== "" && !knownServices.has(code) && !services.has(code)) {
      services.set(code, {
        code,
        displayName: code,
        category: UNKNOWN_SERVICE_CATEGORY,
      });
    }
  }

  return {
    periods: [...periods.values()].sort(byKey((row) => row.periodKey)),
    entities: [...entities.values()].sort(byKey((row) => row.canonicalName)),
    services: [...services.values()].sort(byKey((row) => row.code)),
  };
}

export async function loadDimensionSnapshot(
  store: WarehouseStore
): Promise<DimensionSnapshot> {
  const [periods, entities, services] = await Promise.all([
    store.listDimension("period"),
    store.listDimension("entity"),
    store.listDimension("service"),
  ]);
  return { periods, entities, services };
}

/**
 * Insert missing dimension rows and return the resulting snapshot
 */
export async function consolidateDimensions(
  store: WarehouseStore,
  staging: readonly ObservationRecord[],
  options: DimensionOptions
): Promise<ConsolidationResult> {
  const existing = await loadDimensionSnapshot(store);
  const plan = planDimensions(staging, existing, options);

  const inserted = {
    periods: await store.upsertDimension("period", plan.periods),
    entities: await store.upsertDimension("entity", plan.entities),
    services: await store.upsertDimension("service", plan.services),
  };

  return { snapshot: await loadDimensionSnapshot(store), inserted };
}
