/**
 * Entity canonicalization
 *
 * Raw operator labels arrive with legal suffixes, footnote markers and
 * annotations ("CLARO S.A.", "OI (Telemar)*", "Telefônica Brasil"). They are
 * collapsed onto economic-group names by ordered prefix rules.
 */

import type { EntityRule } from "../../../config/index.js";

const PARENTHETICAL_OR_FOOTNOTE = /\s*\([^)]*\)|\*+/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Upper-case, drop "(...)" annotations and asterisks, collapse whitespace
 */
export function cleanEntityLabel(label: string): string {
  return label
    .toUpperCase()
    .replace(PARENTHETICAL_OR_FOOTNOTE, "")
    .replace(WHITESPACE_RUN, " ")
    .trim();
}

/**
 * Map a raw entity label to its canonical group name.
 *
 * Rules are checked in declaration order and the first rule with a matching
 * prefix wins, so more specific prefixes must be declared first. Labels that
 * match no rule keep their cleaned form.
 */
export function canonicalizeEntity(
  label: string,
  rules: readonly EntityRule[]
): string {
  const cleaned = cleanEntityLabel(label);

  for (const rule of rules) {
    if (
      rule.prefixes.some((prefix) => cleaned.startsWith(prefix.toUpperCase()))
    ) {
      return rule.group;
    }
  }

  return cleaned;
}

export type EntityCanonicalizer = (label: string) => string;

/**
 * Memoized canonicalizer bound to one rule set
 */
export function createEntityCanonicalizer(
  rules: readonly EntityRule[]
): EntityCanonicalizer {
  const cache = new Map<string, string>();

  return (label: string): string => {
    const cached = cache.get(label);
    if (cached !== undefined) {
      return cached;
    }
    const canonical = canonicalizeEntity(label, rules);
    cache.set(label, canonical);
    return canonical;
  };
}
