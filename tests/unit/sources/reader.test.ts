/**
 * Unit tests for the extract reader
 */

import { fileURLToPath } from "node:url";

import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";

import { normalizeTable } from "../../../src/services/etl/normalizer.js";
import {
  detectDelimiter,
  extractMeta,
  parseCsvExtract,
  parseWorkbookExtract,
  readExtractDirectory,
  readExtractFile,
  serviceCodeFromFileName,
  yearFromFileName,
} from "../../../src/sources/reader.js";
import { testConfig } from "../../fixtures/pipeline.js";

const EXTRACTS_DIR = fileURLToPath(
  new URL("../../fixtures/extracts", import.meta.url)
);

describe("Extract reader", () => {
  describe("file name conventions", () => {
    it("should take the service code from the letters of the name", () => {
      expect(serviceCodeFromFileName("SMP2015.ods")).toBe("SMP");
      expect(serviceCodeFromFileName("stfc_2016-v2.xlsx")).toBe("STFCV");
    });

    it("should take the first four-digit group as the year", () => {
      expect(yearFromFileName("SMP2015.ods")).toBe(2015);
      expect(yearFromFileName("smp.csv")).toBeUndefined();
    });

    it("should build the extract metadata", () => {
      expect(extractMeta("/data/SCM2016.csv")).toEqual({
        source: "SCM2016.csv",
        serviceCode: "SCM",
        defaultYear: 2016,
      });
      expect(extractMeta("scm.csv")).toEqual({
        source: "scm.csv",
        serviceCode: "SCM",
      });
    });
  });

  describe("parseCsvExtract", () => {
    it("should detect the delimiter from the first line", () => {
      expect(detectDelimiter("a;b;c\n1,5;2;3")).toBe(";");
      expect(detectDelimiter("\na,b,c\n")).toBe(",");
      expect(detectDelimiter("single\n")).toBe(",");
    });

    it("should turn empty fields into null cells", () => {
      const table = parseCsvExtract(
        "\ufeffGRUPO ECONÔMICO;2015-01 Taxa;2015-02 Taxa\nCLARO S.A.; 87,5 ;\n",
        { source: "smp.csv", serviceCode: "SMP" }
      );

      expect(table).toEqual({
        source: "smp.csv",
        serviceCode: "SMP",
        rows: [
          ["GRUPO ECONÔMICO", "2015-01 Taxa", "2015-02 Taxa"],
          ["CLARO S.A.", "87,5", null],
        ],
      });
    });
  });

  describe("parseWorkbookExtract", () => {
    it("should read the first sheet as a cell grid", () => {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(
        workbook,
        XLSX.utils.aoa_to_sheet([
          ["OPERADORA", "2015-01 Taxa", "2015-02 Taxa"],
          ["OI", null, 91.5],
        ]),
        "Dados"
      );
      const buffer: Buffer = XLSX.write(workbook, {
        type: "buffer",
        bookType: "xlsx",
      });

      const table = parseWorkbookExtract(buffer, {
        source: "SMP2015.xlsx",
        serviceCode: "SMP",
        defaultYear: 2015,
      });

      expect(table).toEqual({
        source: "SMP2015.xlsx",
        serviceCode: "SMP",
        defaultYear: 2015,
        rows: [
          ["OPERADORA", "2015-01 Taxa", "2015-02 Taxa"],
          ["OI", null, 91.5],
        ],
      });
    });
  });

  describe("workbook date headers", () => {
    it("should read date-typed period headers as period keys", () => {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(
        workbook,
        XLSX.utils.aoa_to_sheet([
          [
            "GRUPO ECONÔMICO",
            "VARIÁVEL",
            new Date(2015, 0, 1),
            new Date(2015, 1, 1),
          ],
          ["CLARO", "Taxa de Resolvidas em 5 dias", 80, 88],
        ]),
        "Dados"
      );
      const buffer: Buffer = XLSX.write(workbook, {
        type: "buffer",
        bookType: "xlsx",
      });

      const table = parseWorkbookExtract(buffer, {
        source: "SMP2015.xlsx",
        serviceCode: "SMP",
        defaultYear: 2015,
      });
      const { records, diagnostics } = normalizeTable(
        table,
        testConfig.normalizer
      );

      expect(table.rows[0]).toEqual([
        "GRUPO ECONÔMICO",
        "VARIÁVEL",
        "2015-01",
        "2015-02",
      ]);
      expect(diagnostics.skippedColumns).toEqual([]);
      expect(
        records.map((record) => [record.periodKey, record.value])
      ).toEqual([
        ["2015-01", 80],
        ["2015-02", 88],
      ]);
    });
  });

  describe("readExtractFile", () => {
    it("should read a CSV extract that normalizes with its preamble period", async () => {
      const table = await readExtractFile(`${EXTRACTS_DIR}/SMP2015.csv`);
      const { records, diagnostics } = normalizeTable(
        table,
        testConfig.normalizer
      );

      expect(table.serviceCode).toBe("SMP");
      expect(table.defaultYear).toBe(2015);
      expect(diagnostics.tablePeriod).toEqual({ year: 2015, month: 10 });
      expect(
        records.map((record) => [
          record.entityRaw,
          record.variableName,
          record.value,
        ])
      ).toEqual([
        ["CLARO S.A.", "Taxa de Resolvidas em 5 dias", 87.5],
        ["CLARO S.A.", "Quantidade de Respondidas", 1234],
        ["Oi (Telemar)*", "Taxa de Resolvidas em 5 dias", 90],
      ]);
      expect(diagnostics.skippedCells).toBe(1);
    });

    it("should reject unsupported formats", async () => {
      await expect(
        readExtractFile(`${EXTRACTS_DIR}/README.txt`)
      ).rejects.toThrow('Unsupported extract format ".txt"');
    });
  });

  describe("readExtractDirectory", () => {
    it("should read only supported files", async () => {
      const tables = await readExtractDirectory(EXTRACTS_DIR);

      expect(tables.map((table) => table.source)).toEqual(["SMP2015.csv"]);
    });
  });
});
