/**
 * Extract reader
 *
 * Turns regulator extracts (.csv, .ods, .xlsx, .xls) into RawTable grids.
 * The file name carries the service and year ("SMP2015.ods"), which the
 * normalizer needs for month-only headers.
 */

import { readFile, readdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";

import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";

import { sourcesLogger as logger } from "../logger.js";
import { formatPeriodKey } from "../services/etl/canonical/periods.js";

import type { RawCell, RawTable } from "../types/index.js";

export const SUPPORTED_EXTENSIONS = [".csv", ".ods", ".xlsx", ".xls"] as const;

export interface ExtractMeta {
  source: string;
  serviceCode: string;
  defaultYear?: number;
}

// ============================================================================
// File name conventions
// ============================================================================

function fileStem(fileName: string): string {
  return basename(fileName, extname(fileName));
}

/**
 * "SMP2015.ods" -> "SMP", "stfc_2016-v2.xlsx" -> "STFCV"
 */
export function serviceCodeFromFileName(fileName: string): string {
  return fileStem(fileName)
    .replace(/[^A-Za-z]/g, "")
    .toUpperCase();
}

export function yearFromFileName(fileName: string): number | undefined {
  const match = /\d{4}/.exec(fileStem(fileName));
  return match ? Number.parseInt(match[0], 10) : undefined;
}

export function extractMeta(path: string): ExtractMeta {
  const fileName = basename(path);
  const defaultYear = yearFromFileName(fileName);
  return {
    source: fileName,
    serviceCode: serviceCodeFromFileName(fileName),
    ...(defaultYear !== undefined ? { defaultYear } : {}),
  };
}

function isSupported(fileName: string): boolean {
  const extension = extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

function toTable(rows: RawCell[][], meta: ExtractMeta): RawTable {
  return {
    source: meta.source,
    serviceCode: meta.serviceCode,
    rows,
    ...(meta.defaultYear !== undefined
      ? { defaultYear: meta.defaultYear }
      : {}),
  };
}

// ============================================================================
// Parsers
// ============================================================================

const HALF_DAY_MS = 12 * 60 * 60 * 1000;

/**
 * Date cells in extracts are period headers ("01/01/2015" formatted as a
 * date): read them as the "YYYY-MM" key. Workbook dates may sit up to half
 * a day off local midnight.
 */
function dateCellPeriod(value: Date): string {
  const date = new Date(value.getTime() + HALF_DAY_MS);
  return formatPeriodKey(date.getFullYear(), date.getMonth() + 1);
}

function toRawCell(value: unknown): RawCell {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value instanceof Date) {
    return dateCellPeriod(value);
  }
  return value === undefined ? null : String(value);
}

/**
 * Pick the delimiter of the first non-empty line; Brazilian exports use ";"
 * because "," is the decimal separator
 */
export function detectDelimiter(content: string): "," | ";" {
  const firstLine =
    content.split(/\r?\n/).find((line) => line.trim() !== "") ?? "";
  const semicolons = firstLine.split(";").length - 1;
  const commas = firstLine.split(",").length - 1;
  return semicolons >= commas && semicolons > 0 ? ";" : ",";
}

export function parseCsvExtract(content: string, meta: ExtractMeta): RawTable {
  const rows: string[][] = parse(content, {
    delimiter: detectDelimiter(content),
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    trim: true,
  });

  return toTable(
    rows.map((row) => row.map((cell) => (cell === "" ? null : cell))),
    meta
  );
}

/**
 * Parse the first sheet of a workbook (.ods, .xlsx, .xls)
 */
export function parseWorkbookExtract(
  buffer: Buffer,
  meta: ExtractMeta
): RawTable {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet =
    sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;

  if (sheet === undefined) {
    logger.warn({ source: meta.source }, "Workbook has no sheets");
    return toTable([], meta);
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  return toTable(
    rows.map((row) => row.map((cell) => toRawCell(cell))),
    meta
  );
}

// ============================================================================
// File system
// ============================================================================

export async function readExtractFile(path: string): Promise<RawTable> {
  const meta = extractMeta(path);
  const extension = extname(path).toLowerCase();

  if (extension === ".csv") {
    return parseCsvExtract(await readFile(path, "utf8"), meta);
  }
  if (isSupported(path)) {
    return parseWorkbookExtract(await readFile(path), meta);
  }
  throw new Error(
    `Unsupported extract format "${extension}" (${SUPPORTED_EXTENSIONS.join(", ")})`
  );
}

/**
 * Read every supported extract of a directory, in file name order
 */
export async function readExtractDirectory(dir: string): Promise<RawTable[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && isSupported(entry.name))
    .map((entry) => entry.name)
    .sort();

  logger.info({ dir, files: files.length }, "Reading extracts");

  const tables: RawTable[] = [];
  for (const file of files) {
    const table = await readExtractFile(join(dir, file));
    logger.debug(
      { source: table.source, rows: table.rows.length },
      "Extract read"
    );
    tables.push(table);
  }
  return tables;
}
