import type { PeriodRow, YearMonth } from "../../../types/index.js";

// ============================================================================
// Parsing Patterns
// ============================================================================

// "2015-01", "2015.01", "2015_01", "2015/01"
const YEAR_MONTH_PATTERN = /(?<!\d)(\d{4})[-./_](\d{1,2})(?!\d)/;
// "01/2015", "1-2015"
const MONTH_YEAR_PATTERN = /(?<!\d)(\d{1,2})[-/.](\d{4})(?!\d)/;
// "201501" as a whole label
const COMPACT_PATTERN = /^(\d{4})(\d{2})$/;
// "OUT/2015", "Janeiro 2015", "jan. de 2015"
const NAMED_MONTH_PATTERN =
  /(?<!\p{L})(\p{L}{3,})\.?[\s/._-]*(?:de\s+)?(\d{4})(?!\d)/giu;
const WORD_PATTERN = /^\p{L}{3,}\.?$/u;

const MONTHS: Record<string, number> = {
  janeiro: 1,
  fevereiro: 2,
  marco: 3,
  abril: 4,
  maio: 5,
  junho: 6,
  julho: 7,
  agosto: 8,
  setembro: 9,
  outubro: 10,
  novembro: 11,
  dezembro: 12,
  jan: 1,
  fev: 2,
  mar: 3,
  abr: 4,
  mai: 5,
  jun: 6,
  jul: 7,
  ago: 8,
  set: 9,
  out: 10,
  nov: 11,
  dez: 12,
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  feb: 2,
  apr: 4,
  aug: 8,
  sep: 9,
  oct: 10,
  dec: 12,
};

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

// ============================================================================
// Types
// ============================================================================

export type PeriodMatch =
  | { kind: "period"; year: number; month: number; rest: string }
  | { kind: "invalid"; token: string }
  | { kind: "none" };

// ============================================================================
// Helpers
// ============================================================================

function stripAccents(value: string): string {
  return value.normalize("NFD").replace(/\p{M}/gu, "");
}

export function monthFromName(name: string): number | null {
  const key = stripAccents(name.replace(/\.$/, "")).toLowerCase();
  return MONTHS[key] ?? null;
}

function isValid(year: number, month: number): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    year >= MIN_YEAR &&
    year <= MAX_YEAR &&
    month >= 1 &&
    month <= 12
  );
}

function remainder(text: string, start: number, length: number): string {
  return (text.slice(0, start) + " " + text.slice(start + length))
    .replace(/\(\s*\)/g, "")
    .replace(/^[\s\-–—:|/_.]+|[\s\-–—:|/_]+$/g, "")
    .replace(/\s+/g, " ");
}

function toMatch(
  text: string,
  token: string,
  index: number,
  year: number,
  month: number
): PeriodMatch {
  if (!isValid(year, month)) {
    return { kind: "invalid", token };
  }
  return {
    kind: "period",
    year,
    month,
    rest: remainder(text, index, token.length),
  };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Find the period token inside a column header or preamble line.
 *
 * `rest` is the text left once the token is removed: the variable name of a
 * compound header such as "2015-01 Taxa de Resolvidas em 5 dias". A token
 * that looks like a period but carries an impossible month (or a bare month
 * name with no default year) yields `invalid`.
 */
export function findPeriodToken(
  text: string,
  defaultYear?: number
): PeriodMatch {
  const trimmed = text.trim();
  if (trimmed === "") {
    return { kind: "none" };
  }

  const compact = COMPACT_PATTERN.exec(trimmed);
  if (compact?.[1] && compact[2]) {
    return toMatch(
      trimmed,
      compact[0],
      compact.index,
      Number.parseInt(compact[1], 10),
      Number.parseInt(compact[2], 10)
    );
  }

  const yearMonth = YEAR_MONTH_PATTERN.exec(trimmed);
  if (yearMonth?.[1] && yearMonth[2]) {
    return toMatch(
      trimmed,
      yearMonth[0],
      yearMonth.index,
      Number.parseInt(yearMonth[1], 10),
      Number.parseInt(yearMonth[2], 10)
    );
  }

  const monthYear = MONTH_YEAR_PATTERN.exec(trimmed);
  if (monthYear?.[1] && monthYear[2]) {
    return toMatch(
      trimmed,
      monthYear[0],
      monthYear.index,
      Number.parseInt(monthYear[2], 10),
      Number.parseInt(monthYear[1], 10)
    );
  }

  for (const named of trimmed.matchAll(NAMED_MONTH_PATTERN)) {
    const month = named[1] !== undefined ? monthFromName(named[1]) : null;
    if (month !== null && named[2] !== undefined) {
      return toMatch(
        trimmed,
        named[0],
        named.index ?? 0,
        Number.parseInt(named[2], 10),
        month
      );
    }
  }

  // Bare month name: "JAN", "Março"
  if (WORD_PATTERN.test(trimmed)) {
    const month = monthFromName(trimmed);
    if (month !== null) {
      return defaultYear !== undefined
        ? toMatch(trimmed, trimmed, 0, defaultYear, month)
        : { kind: "invalid", token: trimmed };
    }
  }

  return { kind: "none" };
}

/**
 * Parse a label that is nothing but a period ("2015-01", "OUT/2015")
 */
export function parsePeriodLabel(
  label: string,
  defaultYear?: number
): YearMonth | null {
  const match = findPeriodToken(label, defaultYear);
  if (match.kind !== "period" || match.rest !== "") {
    return null;
  }
  return { year: match.year, month: match.month };
}

// ============================================================================
// Period keys and derived attributes
// ============================================================================

export function formatPeriodKey(year: number, month: number): string {
  return `${String(year)}-${String(month).padStart(2, "0")}`;
}

export function parsePeriodKey(key: string): YearMonth | null {
  const match = /^(\d{4})-(\d{2})$/.exec(key);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  return isValid(year, month) ? { year, month } : null;
}

export function quarterOf(month: number): number {
  return Math.ceil(month / 3);
}

export function halfOf(month: number): number {
  return month <= 6 ? 1 : 2;
}

export function toPeriodRow(year: number, month: number): PeriodRow {
  return {
    periodKey: formatPeriodKey(year, month),
    year,
    month,
    quarter: quarterOf(month),
    half: halfOf(month),
  };
}
