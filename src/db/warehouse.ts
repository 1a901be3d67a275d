/**
 * PostgreSQL WarehouseStore
 *
 * Staging appends and dimension inserts run in batches; each call is one
 * transaction. `replaceFacts` deletes and reloads the fact table inside a
 * single transaction, so a failed load leaves the previous facts in place.
 */

import { sql, type Kysely, type RawBuilder, type Transaction } from "kysely";

import { dbLogger as logger } from "../logger.js";
import { toVarianceCells } from "../services/etl/variance.js";
import { inBatches } from "../utils/batch.js";

import type { Database } from "./types.js";
import type { TableCounts, WarehouseStore } from "../store/types.js";
import type {
  DimensionKind,
  DimensionRowMap,
  FactFilter,
  FactMetric,
  JoinedFactRow,
  ObservationRecord,
  VarianceView,
} from "../types/index.js";

export interface KyselyWarehouseOptions {
  chunkSize?: number;
}

export const PIVOT_VIEW = "vw_variance_pivot";

type Inserters = {
  [K in DimensionKind]: (
    trx: Transaction<Database>,
    rows: readonly DimensionRowMap[K][]
  ) => Promise<number>;
};

type Loaders = {
  [K in DimensionKind]: () => Promise<DimensionRowMap[K][]>;
};

export class KyselyWarehouseStore implements WarehouseStore {
  private readonly chunkSize: number;

  constructor(
    private readonly db: Kysely<Database>,
    options: KyselyWarehouseOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? 1000;
  }

  // ==========================================================================
  // Staging
  // ==========================================================================

  async appendRecords(records: readonly ObservationRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    await this.db.transaction().execute(async (trx) => {
      for (const batch of inBatches(records, this.chunkSize)) {
        await trx
          .insertInto("staging_observations")
          .values(
            batch.map((record) => ({
              period_year: record.periodYear,
              period_month: record.periodMonth,
              period_key: record.periodKey,
              service_code: record.serviceCode,
              entity_raw: record.entityRaw,
              variable_name: record.variableName,
              value: record.value,
              source_file: record.sourceFile,
            }))
          )
          .execute();
      }
    });

    logger.debug({ records: records.length }, "Staging records appended");
    return records.length;
  }

  async clearStaging(): Promise<void> {
    await this.db.deleteFrom("staging_observations").execute();
  }

  async listStaging(): Promise<ObservationRecord[]> {
    const rows = await this.db
      .selectFrom("staging_observations")
      .select([
        "period_year",
        "period_month",
        "period_key",
        "service_code",
        "entity_raw",
        "variable_name",
        "value",
        "source_file",
      ])
      .orderBy("id")
      .execute();

    return rows.map((row) => ({
      periodYear: row.period_year,
      periodMonth: row.period_month,
      periodKey: row.period_key,
      serviceCode: row.service_code,
      entityRaw: row.entity_raw,
      variableName: row.variable_name,
      value: row.value,
      sourceFile: row.source_file,
    }));
  }

  // ==========================================================================
  // Dimensions
  // ==========================================================================

  private readonly inserters: Inserters = {
    period: async (trx, rows) => {
      const inserted = await trx
        .insertInto("dim_periods")
        .values(
          rows.map((row) => ({
            period_key: row.periodKey,
            year: row.year,
            month: row.month,
            quarter: row.quarter,
            half: row.half,
          }))
        )
        .onConflict((oc) => oc.column("period_key").doNothing())
        .returning("id")
        .execute();
      return inserted.length;
    },
    entity: async (trx, rows) => {
      const inserted = await trx
        .insertInto("dim_entities")
        .values(
          rows.map((row) => ({
            canonical_name: row.canonicalName,
            active: row.active,
          }))
        )
        .onConflict((oc) => oc.column("canonical_name").doNothing())
        .returning("id")
        .execute();
      return inserted.length;
    },
    service: async (trx, rows) => {
      const inserted = await trx
        .insertInto("dim_services")
        .values(
          rows.map((row) => ({
            code: row.code,
            display_name: row.displayName,
            category: row.category,
          }))
        )
        .onConflict((oc) => oc.column("code").doNothing())
        .returning("id")
        .execute();
      return inserted.length;
    },
  };

  private readonly loaders: Loaders = {
    period: async () => {
      const rows = await this.db
        .selectFrom("dim_periods")
        .select(["period_key", "year", "month", "quarter", "half"])
        .orderBy("period_key")
        .execute();
      return rows.map((row) => ({
        periodKey: row.period_key,
        year: row.year,
        month: row.month,
        quarter: row.quarter,
        half: row.half,
      }));
    },
    entity: async () => {
      const rows = await this.db
        .selectFrom("dim_entities")
        .select(["canonical_name", "active"])
        .orderBy("canonical_name")
        .execute();
      return rows.map((row) => ({
        canonicalName: row.canonical_name,
        active: row.active,
      }));
    },
    service: async () => {
      const rows = await this.db
        .selectFrom("dim_services")
        .select(["code", "display_name", "category"])
        .orderBy("code")
        .execute();
      return rows.map((row) => ({
        code: row.code,
        displayName: row.display_name,
        category: row.category,
      }));
    },
  };

  async upsertDimension<K extends DimensionKind>(
    kind: K,
    rows: readonly DimensionRowMap[K][]
  ): Promise<number> {
    if (rows.length === 0) return 0;

    const insert = this.inserters[kind];
    const inserted = await this.db.transaction().execute(async (trx) => {
      let count = 0;
      for (const batch of inBatches(rows, this.chunkSize)) {
        count += await insert(trx, batch);
      }
      return count;
    });

    logger.debug(
      { kind, candidates: rows.length, inserted },
      "Dimension upserted"
    );
    return inserted;
  }

  async listDimension<K extends DimensionKind>(
    kind: K
  ): Promise<DimensionRowMap[K][]> {
    return this.loaders[kind]();
  }

  // ==========================================================================
  // Facts
  // ==========================================================================

  async replaceFacts(rows: readonly FactMetric[]): Promise<void> {
    await this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom("fact_metrics").execute();

      for (const batch of inBatches(rows, this.chunkSize)) {
        await trx
          .insertInto("fact_metrics")
          .values(
            batch.map((fact) => ({
              period_key: fact.periodKey,
              entity_name: fact.entityName,
              service_code: fact.serviceCode,
              rate_resolved_5d: fact.rateResolved5d,
              rate_resolved_total: fact.rateResolvedTotal,
              total_requests: fact.totalRequests,
              resolved_requests: fact.resolvedRequests,
            }))
          )
          .execute();
      }
    });
  }

  async listFacts(filter: FactFilter = {}): Promise<FactMetric[]> {
    let query = this.db
      .selectFrom("fact_metrics")
      .select([
        "period_key",
        "entity_name",
        "service_code",
        "rate_resolved_5d",
        "rate_resolved_total",
        "total_requests",
        "resolved_requests",
      ]);

    if (filter.periodFrom !== undefined) {
      query = query.where("period_key", ">=", filter.periodFrom);
    }
    if (filter.periodTo !== undefined) {
      query = query.where("period_key", "<=", filter.periodTo);
    }
    if (filter.entityName !== undefined) {
      query = query.where("entity_name", "=", filter.entityName);
    }
    if (filter.serviceCode !== undefined) {
      query = query.where(
        "service_code",
        "=",
        filter.serviceCode.toUpperCase()
      );
    }
    if (filter.limit !== undefined) {
      query = query.limit(filter.limit);
    }

    const rows = await query
      .orderBy("period_key")
      .orderBy("entity_name")
      .orderBy("service_code")
      .execute();

    return rows.map((row) => ({
      periodKey: row.period_key,
      entityName: row.entity_name,
      serviceCode: row.service_code,
      rateResolved5d: row.rate_resolved_5d,
      rateResolvedTotal: row.rate_resolved_total,
      totalRequests: row.total_requests,
      resolvedRequests: row.resolved_requests,
    }));
  }

  async queryJoined(): Promise<JoinedFactRow[]> {
    const rows = await this.db
      .selectFrom("fact_metrics as f")
      .innerJoin("dim_periods as p", "p.period_key", "f.period_key")
      .innerJoin("dim_entities as e", "e.canonical_name", "f.entity_name")
      .select([
        "p.period_key",
        "p.year",
        "p.month",
        "e.canonical_name",
        "e.active",
        "f.service_code",
        "f.rate_resolved_5d",
      ])
      .orderBy("p.period_key")
      .orderBy("e.canonical_name")
      .orderBy("f.service_code")
      .execute();

    return rows.map((row) => ({
      periodKey: row.period_key,
      year: row.year,
      month: row.month,
      entityName: row.canonical_name,
      entityActive: row.active,
      serviceCode: row.service_code,
      rateResolved5d: row.rate_resolved_5d,
    }));
  }

  // ==========================================================================
  // Variance
  // ==========================================================================

  /**
   * Store the variance cells and regenerate vw_variance_pivot with one
   * column per entity of the view
   */
  async materializeVariance(view: VarianceView): Promise<void> {
    const cells = toVarianceCells(view);

    await this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom("variance_cells").execute();

      for (const batch of inBatches(cells, this.chunkSize)) {
        await trx
          .insertInto("variance_cells")
          .values(
            batch.map((cell) => ({
              period_key: cell.periodKey,
              entity_name: cell.entityName,
              market_variance: cell.marketVariancePct,
              difference: cell.difference,
              market_series: view.marketSeries,
            }))
          )
          .execute();
      }

      await sql`DROP VIEW IF EXISTS ${sql.table(PIVOT_VIEW)}`.execute(trx);
      await pivotViewDefinition(view.entities).execute(trx);
    });

    logger.info(
      { cells: cells.length, columns: view.entities.length },
      "Variance pivot materialized"
    );
  }

  async tableCounts(): Promise<TableCounts> {
    const [staging, periods, entities, services, facts, varianceCells] =
      await Promise.all([
        this.count("staging_observations"),
        this.count("dim_periods"),
        this.count("dim_entities"),
        this.count("dim_services"),
        this.count("fact_metrics"),
        this.count("variance_cells"),
      ]);
    return { staging, periods, entities, services, facts, varianceCells };
  }

  private async count(table: keyof Database): Promise<number> {
    const result = await sql<{
      count: number;
    }>`SELECT COUNT(*)::int AS count FROM ${sql.table(table)}`.execute(
      this.db
    );
    return result.rows[0]?.count ?? 0;
  }
}

/**
 * CREATE VIEW statement for the pivot: market variance plus one column per
 * entity, 0 where the entity has no difference for the period
 */
export function pivotViewDefinition(
  entities: readonly string[]
): RawBuilder<unknown> {
  const columns = [
    sql`period_key`,
    sql`MAX(market_variance) AS market_variance`,
    ...entities.map(
      (entity) =>
        sql`COALESCE(MAX(difference) FILTER (WHERE entity_name = ${sql.lit(
          entity
        )}), 0) AS ${sql.id(entity)}`
    ),
  ];

  return sql`CREATE VIEW ${sql.table(PIVOT_VIEW)} AS
    SELECT ${sql.join(columns)}
    FROM variance_cells
    GROUP BY period_key
    ORDER BY period_key`;
}
