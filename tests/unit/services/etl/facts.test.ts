/**
 * Unit tests for the fact builder
 */

import { describe, it, expect } from "vitest";

import { ReferentialError } from "../../../../src/errors.js";
import { createEntityCanonicalizer } from "../../../../src/services/etl/canonical/entities.js";
import { toPeriodRow } from "../../../../src/services/etl/canonical/periods.js";
import {
  buildFacts,
  matchesVariable,
  resolveSynonym,
  type FactOptions,
} from "../../../../src/services/etl/facts.js";
import { observation, testConfig } from "../../../fixtures/pipeline.js";

import type { DimensionSnapshot } from "../../../../src/types/index.js";

const options: FactOptions = {
  canonicalize: createEntityCanonicalizer(testConfig.canonicalization.rules),
  metrics: testConfig.metrics,
};

const dimensions: DimensionSnapshot = {
  periods: [toPeriodRow(2015, 1), toPeriodRow(2015, 2)],
  entities: [
    { canonicalName: "CLARO", active: true },
    { canonicalName: "OI", active: true },
    { canonicalName: "VIVO", active: true },
  ],
  services: testConfig.services.map((service) => ({ ...service })),
};

describe("Fact Builder", () => {
  describe("matchesVariable", () => {
    it("should compare labels ignoring case and repeated whitespace", () => {
      expect(
        matchesVariable("QUANTIDADE  DE RESPONDIDAS ", {
          label: "Quantidade de Respondidas",
          match: "exact",
        })
      ).toBe(true);
    });

    it("should match prefixes only for prefix matchers", () => {
      const label = "Taxa de Resolvidas em 5 dias úteis";
      expect(
        matchesVariable(label, {
          label: "Taxa de Resolvidas em 5 dias",
          match: "prefix",
        })
      ).toBe(true);
      expect(
        matchesVariable(label, {
          label: "Taxa de Resolvidas em 5 dias",
          match: "exact",
        })
      ).toBe(false);
    });
  });

  describe("resolveSynonym", () => {
    it("should take the first matcher that has a value", () => {
      const chain = testConfig.metrics.totalRequests;
      expect(
        resolveSynonym(
          [
            { label: "Quantidade de Sol. Respondidas no Período", value: 950 },
            { label: "Quantidade de Respondidas", value: 1000 },
          ],
          chain
        )
      ).toBe(1000);
      expect(
        resolveSynonym(
          [{ label: "Quantidade de Sol. Respondidas no Período", value: 950 }],
          chain
        )
      ).toBe(950);
    });

    it("should return null when nothing matches", () => {
      expect(
        resolveSynonym(
          [{ label: "Outra coisa", value: 1 }],
          testConfig.metrics.totalRequests
        )
      ).toBeNull();
    });
  });

  describe("buildFacts", () => {
    it("should build one fact per period, canonical entity and service", () => {
      const { facts, warnings } = buildFacts(
        [observation("CLARO S.A.", "Taxa de Resolvidas em 5 dias", 87.5)],
        dimensions,
        options
      );

      expect(facts).toEqual([
        {
          periodKey: "2015-01",
          entityName: "CLARO",
          serviceCode: "SMP",
          rateResolved5d: 87.5,
          rateResolvedTotal: 0,
          totalRequests: 0,
          resolvedRequests: 0,
        },
      ]);
      expect(warnings).toEqual([]);
    });

    it("should prefer the higher-priority synonym over a later one", () => {
      const { facts } = buildFacts(
        [
          observation("OI", "Quantidade de Respondidas", 1000),
          observation("OI", "Quantidade de Sol. Respondidas no Período", 950),
        ],
        dimensions,
        options
      );

      expect(facts[0]?.totalRequests).toBe(1000);
    });

    it("should fall back along the 5-day rate chain", () => {
      const { facts } = buildFacts(
        [
          observation("OI", "Índice de Desempenho no Atendimento", 71.2),
          observation("VIVO", "Taxa de Respondidas em 5 dias", 93),
        ],
        dimensions,
        options
      );

      expect(
        facts.map((row) => [row.entityName, row.rateResolved5d])
      ).toEqual([
        ["OI", 71.2],
        ["VIVO", 93],
      ]);
    });

    it("should merge raw labels of the same group and keep the largest value", () => {
      const { facts } = buildFacts(
        [
          observation("Claro S.A.", "Taxa de Resolvidas em 5 dias", 87),
          observation("CLARO", "Taxa de Resolvidas em 5 dias", 90),
        ],
        dimensions,
        options
      );

      expect(facts).toHaveLength(1);
      expect(facts[0]?.rateResolved5d).toBe(90);
    });

    it("should clamp rates to 0-100 and round counts", () => {
      const { facts } = buildFacts(
        [
          observation("OI", "Taxa de Resolvidas em 5 dias", 120),
          observation("OI", "Taxa de Resolvidas no Período", -3),
          observation("OI", "Quantidade de Respondidas", 999.6),
          observation("VIVO", "Taxa de Resolvidas em 5 dias", 87.456),
        ],
        dimensions,
        options
      );

      expect(facts[0]).toMatchObject({
        entityName: "OI",
        rateResolved5d: 100,
        rateResolvedTotal: 0,
        totalRequests: 1000,
      });
      expect(facts[1]?.rateResolved5d).toBe(87.46);
    });

    it("should derive resolved requests from the total rate", () => {
      const { facts } = buildFacts(
        [
          observation("OI", "Quantidade de Respondidas", 1000),
          observation("OI", "Taxa de Resolvidas no Período", 80),
        ],
        dimensions,
        options
      );

      expect(facts[0]?.resolvedRequests).toBe(800);
    });

    it("should warn when resolved requests exceed the total", () => {
      const { facts, warnings } = buildFacts(
        [
          observation("OI", "Quantidade de Respondidas", 1000),
          observation("OI", "Quantidade de Resolvidas", 1200),
        ],
        dimensions,
        options
      );

      expect(facts[0]?.resolvedRequests).toBe(1200);
      expect(warnings).toEqual([
        {
          periodKey: "2015-01",
          entityName: "OI",
          serviceCode: "SMP",
          message: "resolvedRequests (1200) exceeds totalRequests (1000)",
        },
      ]);
    });

    it("should count staging rows whose entity label cleans to nothing", () => {
      const { facts, unlabeledRecords } = buildFacts(
        [
          observation("(nota 1)*", "Taxa de Resolvidas em 5 dias", 80),
          observation("OI", "Taxa de Resolvidas em 5 dias", 75),
        ],
        dimensions,
        options
      );

      expect(facts.map((row) => row.entityName)).toEqual(["OI"]);
      expect(unlabeledRecords).toBe(1);
    });

    it("should sort facts and give the same result on every run", () => {
      const staging = [
        observation("VIVO", "Taxa de Resolvidas em 5 dias", 90, "2015-02"),
        observation("OI", "Taxa de Resolvidas em 5 dias", 80, "2015-02"),
        observation("VIVO", "Taxa de Resolvidas em 5 dias", 85, "2015-01"),
        observation("OI", "Taxa de Resolvidas em 5 dias", 70, "2015-01", "stfc"),
      ];

      const first = buildFacts(staging, dimensions, options);
      const second = buildFacts(staging, dimensions, options);

      expect(
        first.facts.map(
          (row) => `${row.periodKey}/${row.entityName}/${row.serviceCode}`
        )
      ).toEqual([
        "2015-01/OI/STFC",
        "2015-01/VIVO/SMP",
        "2015-02/OI/SMP",
        "2015-02/VIVO/SMP",
      ]);
      expect(second).toEqual(first);
    });

    it("should throw ReferentialError listing unknown dimension keys", () => {
      const staging = [
        observation("NEXTEL", "Taxa de Resolvidas em 5 dias", 80, "2015-03"),
        observation("OI", "Taxa de Resolvidas em 5 dias", 80, "2015-01", "TV"),
      ];

      let caught: unknown;
      try {
        buildFacts(staging, dimensions, options);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ReferentialError);
      expect(caught instanceof ReferentialError && caught.missing).toEqual({
        periods: ["2015-03"],
        entities: ["NEXTEL"],
        services: ["TV"],
      });
    });
  });
});
