/**
 * Unit tests for the in-process warehouse store
 */

import { describe, it, expect, beforeEach } from "vitest";

import { toPeriodRow } from "../../../src/services/etl/canonical/periods.js";
import { buildVarianceView } from "../../../src/services/etl/variance.js";
import {
  MemoryWarehouseStore,
  matchesFilter,
} from "../../../src/store/memory.js";
import { activeEntities, fact, joined } from "../../fixtures/pipeline.js";

async function seededStore(): Promise<MemoryWarehouseStore> {
  const store = new MemoryWarehouseStore();
  await store.upsertDimension("period", [
    toPeriodRow(2015, 1),
    toPeriodRow(2015, 2),
  ]);
  await store.upsertDimension("entity", activeEntities("CLARO", "OI"));
  await store.upsertDimension("service", [
    { code: "SMP", displayName: "Serviço Móvel Pessoal", category: "Móvel" },
    { code: "STFC", displayName: "Telefonia Fixa", category: "Fixa" },
  ]);
  return store;
}

describe("MemoryWarehouseStore", () => {
  let store: MemoryWarehouseStore;

  beforeEach(async () => {
    store = await seededStore();
  });

  describe("dimensions", () => {
    it("should insert rows only when the natural key is absent", async () => {
      const inserted = await store.upsertDimension("entity", [
        { canonicalName: "OI", active: false },
        { canonicalName: "TIM", active: true },
      ]);

      expect(inserted).toBe(1);
      expect(await store.listDimension("entity")).toEqual([
        { canonicalName: "CLARO", active: true },
        { canonicalName: "OI", active: true },
        { canonicalName: "TIM", active: true },
      ]);
    });
  });

  describe("replaceFacts", () => {
    it("should replace the whole fact relation", async () => {
      await store.replaceFacts([fact("2015-01", "CLARO", 80)]);
      await store.replaceFacts([fact("2015-02", "OI", 70)]);

      expect(await store.listFacts()).toEqual([fact("2015-02", "OI", 70)]);
    });

    it("should reject duplicate fact keys and keep the previous facts", async () => {
      await store.replaceFacts([fact("2015-01", "CLARO", 80)]);

      await expect(
        store.replaceFacts([
          fact("2015-01", "OI", 70),
          fact("2015-01", "OI", 75),
        ])
      ).rejects.toThrow("Duplicate fact row for 2015-01|OI|SMP");
      expect(await store.listFacts()).toEqual([fact("2015-01", "CLARO", 80)]);
    });

    it("should reject facts that reference missing dimension rows", async () => {
      await expect(
        store.replaceFacts([fact("2015-03", "CLARO", 80)])
      ).rejects.toThrow("references a missing dimension row");
    });
  });

  describe("listFacts", () => {
    beforeEach(async () => {
      await store.replaceFacts([
        fact("2015-02", "OI", 70),
        fact("2015-01", "OI", 60, { serviceCode: "STFC" }),
        fact("2015-01", "CLARO", 80),
        fact("2015-02", "CLARO", 82),
      ]);
    });

    it("should order facts by period, entity and service", async () => {
      const facts = await store.listFacts();

      expect(
        facts.map(
          (row) => `${row.periodKey}/${row.entityName}/${row.serviceCode}`
        )
      ).toEqual([
        "2015-01/CLARO/SMP",
        "2015-01/OI/STFC",
        "2015-02/CLARO/SMP",
        "2015-02/OI/SMP",
      ]);
    });

    it("should apply filters and the limit", async () => {
      expect(
        await store.listFacts({ periodFrom: "2015-02", entityName: "OI" })
      ).toEqual([fact("2015-02", "OI", 70)]);
      expect(await store.listFacts({ serviceCode: "stfc" })).toHaveLength(1);
      expect(await store.listFacts({ limit: 2 })).toHaveLength(2);
    });
  });

  describe("queryJoined", () => {
    it("should join facts with their period and entity rows", async () => {
      await store.replaceFacts([fact("2015-01", "CLARO", 80)]);

      expect(await store.queryJoined()).toEqual([
        joined("2015-01", "CLARO", 80),
      ]);
    });
  });

  describe("materializeVariance", () => {
    it("should keep the view and its cells", async () => {
      const view = buildVarianceView(
        [
          joined("2015-01", "CLARO", 80),
          joined("2015-02", "CLARO", 80),
        ],
        activeEntities("CLARO"),
        { marketSeries: "global" }
      );

      await store.materializeVariance(view);

      expect(store.materializedView).toBe(view);
      expect(store.storedVarianceCells).toHaveLength(2);
      expect((await store.tableCounts()).varianceCells).toBe(2);
    });
  });
});

describe("matchesFilter", () => {
  it("should compare period keys as inclusive bounds", () => {
    const row = fact("2015-02", "OI", 70);
    expect(
      matchesFilter(row, { periodFrom: "2015-02", periodTo: "2015-02" })
    ).toBe(true);
    expect(matchesFilter(row, { periodTo: "2015-01" })).toBe(false);
  });
});
