/**
 * Unit tests for numeric helpers
 */

import { describe, it, expect } from "vitest";

import { inBatches } from "../../../src/utils/batch.js";
import {
  clamp,
  mean,
  roundHalfAwayFromZero,
} from "../../../src/utils/numbers.js";

describe("Numeric utils", () => {
  describe("roundHalfAwayFromZero", () => {
    it("should round halves away from zero", () => {
      expect(roundHalfAwayFromZero(2.25, 1)).toBe(2.3);
      expect(roundHalfAwayFromZero(-2.25, 1)).toBe(-2.3);
      expect(roundHalfAwayFromZero(1.005, 2)).toBe(1.01);
    });

    it("should never return negative zero", () => {
      expect(Object.is(roundHalfAwayFromZero(-0.01, 1), 0)).toBe(true);
    });
  });

  it("should clamp into the range", () => {
    expect(clamp(120, 0, 100)).toBe(100);
    expect(clamp(-1, 0, 100)).toBe(0);
    expect(clamp(42, 0, 100)).toBe(42);
  });

  it("should average values", () => {
    expect(mean([1, 2, 3, 6])).toBe(3);
  });

  describe("inBatches", () => {
    it("should split into consecutive batches", () => {
      expect(inBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
      expect(inBatches([], 10)).toEqual([]);
    });

    it("should reject a non-positive size", () => {
      expect(() => inBatches([1], 0)).toThrow(RangeError);
    });
  });
});
