/**
 * Fact Builder
 *
 * Collapses staging observations into one FactMetric per
 * (period, canonical entity, service). Extracts from different years name
 * the same metric differently, so each target metric is resolved through an
 * ordered chain of label matchers: the first matcher that has a value in
 * the group wins.
 */

import { ReferentialError } from "../../errors.js";
import { clamp, roundHalfAwayFromZero } from "../../utils/numbers.js";

import type { MetricSynonyms, VariableMatcher } from "../../config/index.js";
import type {
  DimensionSnapshot,
  FactMetric,
  ObservationRecord,
} from "../../types/index.js";
import type { EntityCanonicalizer } from "./canonical/entities.js";

// ============================================================================
// Types
// ============================================================================

export interface FactOptions {
  canonicalize: EntityCanonicalizer;
  metrics: MetricSynonyms;
}

export interface FactWarning {
  periodKey: string;
  entityName: string;
  serviceCode: string;
  message: string;
}

export interface FactBuildResult {
  facts: FactMetric[];
  warnings: FactWarning[];
  /** Staging rows whose entity label cleans to nothing */
  unlabeledRecords: number;
}

interface Observation {
  label: string;
  value: number;
}

interface FactGroup {
  periodKey: string;
  entityName: string;
  serviceCode: string;
  observations: Observation[];
}

// ============================================================================
// Synonym matching
// ============================================================================

export function normalizeVariableLabel(label: string): string {
  return label.replace(/\s+/g, " ").trim().toLowerCase();
}

export function matchesVariable(
  label: string,
  matcher: VariableMatcher
): boolean {
  const normalized = normalizeVariableLabel(label);
  const target = normalizeVariableLabel(matcher.label);
  return matcher.match === "exact"
    ? normalized === target
    : normalized.startsWith(target);
}

/**
 * Value of the first matcher in the chain that has any observation.
 * Several observations for that matcher resolve to the largest one.
 */
export function resolveSynonym(
  observations: readonly Observation[],
  chain: readonly VariableMatcher[]
): number | null {
  for (const matcher of chain) {
    let best: number | null = null;
    for (const observation of observations) {
      if (!matchesVariable(observation.label, matcher)) continue;
      if (best === null || observation.value > best) {
        best = observation.value;
      }
    }
    if (best !== null) {
      return best;
    }
  }
  return null;
}

function toRate(value: number | null): number {
  return value === null ? 0 : roundHalfAwayFromZero(clamp(value, 0, 100), 2);
}

function toCount(value: number | null): number {
  return value === null ? 0 : Math.max(0, Math.round(value));
}

// ============================================================================
// Grouping and referential checks
// ============================================================================

export type FactKey = Pick<
  FactMetric,
  "periodKey" | "entityName" | "serviceCode"
>;

function groupKey(
  periodKey: string,
  entityName: string,
  serviceCode: string
): string {
  return `${periodKey}\u0000${entityName}\u0000${serviceCode}`;
}

function groupStaging(
  staging: readonly ObservationRecord[],
  canonicalize: EntityCanonicalizer
): { groups: FactGroup[]; unlabeled: number } {
  const groups = new Map<string, FactGroup>();
  let unlabeled = 0;

  for (const record of staging) {
    const entityName = canonicalize(record.entityRaw);
    if (entityName === "") {
      unlabeled++;
      continue;
    }
    const serviceCode = record.serviceCode.trim().toUpperCase();
    const key = groupKey(record.periodKey, entityName, serviceCode);

    let group = groups.get(key);
    if (group === undefined) {
      group = {
        periodKey: record.periodKey,
        entityName,
        serviceCode,
        observations: [],
      };
      groups.set(key, group);
    }
    group.observations.push({
      label: record.variableName,
      value: record.value,
    });
  }

  return { groups: [...groups.values()], unlabeled };
}

function assertReferences(
  groups: readonly FactGroup[],
  dimensions: DimensionSnapshot
): void {
  const periods = new Set(dimensions.periods.map((row) => row.periodKey));
  const entities = new Set(
    dimensions.entities.map((row) => row.canonicalName)
  );
  const services = new Set(dimensions.services.map((row) => row.code));

  const missing = {
    periods: new Set<string>(),
    entities: new Set<string>(),
    services: new Set<string>(),
  };
  for (const group of groups) {
    if (!periods.has(group.periodKey)) {
      missing.periods.add(group.periodKey);
    }
    if (!entities.has(group.entityName)) {
      missing.entities.add(group.entityName);
    }
    if (!services.has(group.serviceCode)) {
      missing.services.add(group.serviceCode);
    }
  }

  if (
    missing.periods.size > 0 ||
    missing.entities.size > 0 ||
    missing.services.size > 0
  ) {
    throw new ReferentialError({
      periods: [...missing.periods].sort(),
      entities: [...missing.entities].sort(),
      services: [...missing.services].sort(),
    });
  }
}

// ============================================================================
// Builder
// ============================================================================

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Fact order: period, then entity, then service
 */
export function compareFactKeys(a: FactKey, b: FactKey): number {
  return (
    compareText(a.periodKey, b.periodKey) ||
    compareText(a.entityName, b.entityName) ||
    compareText(a.serviceCode, b.serviceCode)
  );
}

/**
 * Build the fact rows for the given staging contents.
 * Pure: the same staging and dimensions always give the same rows in the
 * same order.
 */
export function buildFacts(
  staging: readonly ObservationRecord[],
  dimensions: DimensionSnapshot,
  options: FactOptions
): FactBuildResult {
  const { groups, unlabeled } = groupStaging(staging, options.canonicalize);
  assertReferences(groups, dimensions);

  const { metrics } = options;
  const facts: FactMetric[] = [];
  const warnings: FactWarning[] = [];

  for (const group of groups) {
    const rate5d = resolveSynonym(group.observations, metrics.rateResolved5d);
    const rateTotal = resolveSynonym(
      group.observations,
      metrics.rateResolvedTotal
    );
    const total = resolveSynonym(group.observations, metrics.totalRequests);
    const resolved = resolveSynonym(
      group.observations,
      metrics.resolvedRequests
    );

    const fact: FactMetric = {
      periodKey: group.periodKey,
      entityName: group.entityName,
      serviceCode: group.serviceCode,
      rateResolved5d: toRate(rate5d),
      rateResolvedTotal: toRate(rateTotal),
      totalRequests: toCount(total),
      resolvedRequests: 0,
    };

    if (resolved !== null) {
      fact.resolvedRequests = toCount(resolved);
    } else if (total !== null && rateTotal !== null) {
      fact.resolvedRequests = toCount(
        (fact.totalRequests * fact.rateResolvedTotal) / 100
      );
    }

    if (fact.resolvedRequests > fact.totalRequests) {
      warnings.push({
        periodKey: fact.periodKey,
        entityName: fact.entityName,
        serviceCode: fact.serviceCode,
        message: `resolvedRequests (${String(fact.resolvedRequests)}) exceeds totalRequests (${String(fact.totalRequests)})`,
      });
    }

    facts.push(fact);
  }

  facts.sort(compareFactKeys);
  warnings.sort(compareFactKeys);
  return { facts, warnings, unlabeledRecords: unlabeled };
}
