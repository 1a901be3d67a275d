/**
 * Unit tests for the record normalizer
 */

import { describe, it, expect } from "vitest";

import {
  normalizeTable,
  parseNumericCell,
} from "../../../../src/services/etl/normalizer.js";
import { rawTable, testConfig } from "../../../fixtures/pipeline.js";

const config = testConfig.normalizer;

describe("Record Normalizer", () => {
  describe("parseNumericCell", () => {
    it("should parse Brazilian-formatted numbers", () => {
      expect(parseNumericCell("87,5")).toBe(87.5);
      expect(parseNumericCell("1.234,5")).toBe(1234.5);
      expect(parseNumericCell("12.5 %")).toBe(12.5);
    });

    it("should pass finite numbers through and keep zero", () => {
      expect(parseNumericCell(42)).toBe(42);
      expect(parseNumericCell(0)).toBe(0);
      expect(parseNumericCell("0")).toBe(0);
    });

    it("should return null for non-numeric cells", () => {
      expect(parseNumericCell(null)).toBeNull();
      expect(parseNumericCell("")).toBeNull();
      expect(parseNumericCell("-")).toBeNull();
      expect(parseNumericCell("n/d")).toBeNull();
      expect(parseNumericCell(true)).toBeNull();
      expect(parseNumericCell(Number.NaN)).toBeNull();
    });
  });

  describe("normalizeTable", () => {
    it("should reshape a compound period-variable column", () => {
      const { records, diagnostics } = normalizeTable(
        rawTable(
          [
            ["GRUPO ECONÔMICO", "2015-01 Taxa de Resolvidas em 5 dias"],
            ["CLARO S.A.", 87.5],
          ],
          { serviceCode: "smp" }
        ),
        config
      );

      expect(records).toEqual([
        {
          periodYear: 2015,
          periodMonth: 1,
          periodKey: "2015-01",
          serviceCode: "SMP",
          entityRaw: "CLARO S.A.",
          variableName: "Taxa de Resolvidas em 5 dias",
          value: 87.5,
          sourceFile: "smp_2015.csv",
        },
      ]);
      expect(diagnostics).toEqual({
        source: "smp_2015.csv",
        recordCount: 1,
        periodColumns: 1,
        skippedCells: 0,
        skippedColumns: [],
        headerRow: 0,
        tablePeriod: null,
      });
    });

    it("should skip a column with an unparseable period and keep the others", () => {
      const { records, diagnostics } = normalizeTable(
        rawTable([
          [
            "OPERADORA",
            "2015-01 Taxa de Resolvidas em 5 dias",
            "2015-13 Taxa de Resolvidas em 5 dias",
          ],
          ["OI", "90,5", "80"],
        ]),
        config
      );

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ periodKey: "2015-01", value: 90.5 });
      expect(diagnostics.skippedColumns).toEqual([
        {
          header: "2015-13 Taxa de Resolvidas em 5 dias",
          index: 2,
          reason: "invalid-period",
        },
      ]);
    });

    it("should read the variable from a variable column", () => {
      const { records } = normalizeTable(
        rawTable([
          ["GRUPO ECONÔMICO", "VARIÁVEL", "2015-01", "2015-02"],
          ["VIVO", "Quantidade de Respondidas", "1.234,0", "1300"],
        ]),
        config
      );

      expect(
        records.map((record) => [
          record.periodKey,
          record.variableName,
          record.value,
        ])
      ).toEqual([
        ["2015-01", "Quantidade de Respondidas", 1234],
        ["2015-02", "Quantidade de Respondidas", 1300],
      ]);
    });

    it("should take the table period from the preamble", () => {
      const { records, diagnostics } = normalizeTable(
        rawTable([
          ["PERÍODO: OUT/2015"],
          [],
          [
            "GRUPO ECONÔMICO",
            "Taxa de Resolvidas em 5 dias",
            "Quantidade de Respondidas",
          ],
          ["TIM", "88", "1000"],
        ]),
        config
      );

      expect(diagnostics.headerRow).toBe(2);
      expect(diagnostics.tablePeriod).toEqual({ year: 2015, month: 10 });
      expect(records.map((record) => record.periodKey)).toEqual([
        "2015-10",
        "2015-10",
      ]);
      expect(records.map((record) => record.variableName)).toEqual([
        "Taxa de Resolvidas em 5 dias",
        "Quantidade de Respondidas",
      ]);
    });

    it("should prefer the period given with the table", () => {
      const { records } = normalizeTable(
        rawTable(
          [
            ["GRUPO ECONÔMICO", "Taxa de Resolvidas em 5 dias"],
            ["TIM", "88"],
          ],
          { period: { year: 2016, month: 3 } }
        ),
        config
      );

      expect(records[0]?.periodKey).toBe("2016-03");
    });

    it("should report columns without a period or variable", () => {
      const { records, diagnostics } = normalizeTable(
        rawTable([
          ["GRUPO ECONÔMICO", "", "Taxa de Resolvidas em 5 dias", "2015-01"],
          ["OI", "1", "2", "3"],
        ]),
        config
      );

      expect(records).toEqual([]);
      expect(diagnostics.skippedColumns).toEqual([
        { header: "", index: 1, reason: "empty-header" },
        {
          header: "Taxa de Resolvidas em 5 dias",
          index: 2,
          reason: "no-period",
        },
        { header: "2015-01", index: 3, reason: "missing-variable" },
      ]);
    });

    it("should count blank, non-numeric and negative cells as skipped", () => {
      const { records, diagnostics } = normalizeTable(
        rawTable([
          ["GRUPO ECONÔMICO", "2015-01 A", "2015-02 A", "2015-03 A", "2015-04 A"],
          ["OI", "0", "-", -5, null],
          ["", 1, 2, 3, 4],
        ]),
        config
      );

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ periodKey: "2015-01", value: 0 });
      expect(diagnostics.skippedCells).toBe(3);
    });

    it("should keep negative values when configured to", () => {
      const { records } = normalizeTable(
        rawTable([
          ["GRUPO ECONÔMICO", "2015-01 A"],
          ["OI", -5],
        ]),
        { ...config, dropNegativeValues: false }
      );

      expect(records[0]?.value).toBe(-5);
    });
  });
});
