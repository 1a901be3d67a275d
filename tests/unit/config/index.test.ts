/**
 * Unit tests for pipeline configuration loading
 */

import { describe, it, expect } from "vitest";

import {
  loadPipelineConfig,
  parsePipelineConfig,
  withMarketSeries,
} from "../../../src/config/index.js";
import { ConfigError } from "../../../src/errors.js";
import { testConfig } from "../../fixtures/pipeline.js";

function configError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("Expected a ConfigError");
}

describe("Pipeline configuration", () => {
  describe("loadPipelineConfig", () => {
    it("should load the bundled configuration", () => {
      expect(testConfig.variance.marketSeries).toBe("global");
      expect(testConfig.services.map((service) => service.code)).toEqual([
        "SMP",
        "STFC",
        "SCM",
      ]);
      expect(testConfig.metrics.rateResolved5d[0]).toEqual({
        label: "Taxa de Resolvidas em 5 dias",
        match: "prefix",
      });
    });

    it("should return a frozen configuration", () => {
      expect(Object.isFrozen(testConfig)).toBe(true);
      expect(Object.isFrozen(testConfig.canonicalization.rules)).toBe(true);
    });

    it("should report an unreadable file as a ConfigError", () => {
      const error = configError(() =>
        loadPipelineConfig("/nonexistent/pipeline.json")
      );
      expect(error.message).toMatch(
        /^Cannot read pipeline configuration at \/nonexistent\/pipeline\.json/
      );
    });
  });

  describe("parsePipelineConfig", () => {
    it("should list schema violations with their path", () => {
      const error = configError(() =>
        parsePipelineConfig({
          ...structuredClone(testConfig),
          staging: { chunkSize: 0 },
        })
      );

      expect(
        error.issues.some((issue) => issue.startsWith("/staging/chunkSize"))
      ).toBe(true);
    });

    it("should reject group names that do not canonicalize to themselves", () => {
      const error = configError(() =>
        parsePipelineConfig({
          ...structuredClone(testConfig),
          canonicalization: {
            rules: [
              { group: "CLARO", prefixes: ["CLARO"] },
              { group: "CLARO TELECOM", prefixes: ["EMBRATEL"] },
            ],
          },
        })
      );

      expect(error.issues).toEqual([
        '/canonicalization/rules: group "CLARO TELECOM" canonicalizes to "CLARO"',
      ]);
    });
  });

  describe("withMarketSeries", () => {
    it("should return the same object when nothing changes", () => {
      expect(withMarketSeries(testConfig, undefined)).toBe(testConfig);
      expect(withMarketSeries(testConfig, "global")).toBe(testConfig);
    });

    it("should override the variant on a copy", () => {
      const override = withMarketSeries(testConfig, "per-entity");

      expect(override.variance.marketSeries).toBe("per-entity");
      expect(override.metrics).toEqual(testConfig.metrics);
      expect(testConfig.variance.marketSeries).toBe("global");
    });
  });
});
