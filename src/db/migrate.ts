import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { dbLogger as logger } from "../logger.js";
import { closeConnection, pool } from "./connection.js";
import { PIVOT_VIEW } from "./warehouse.js";

export const SCHEMA_PATH = fileURLToPath(
  new URL("../../sql/schema.sql", import.meta.url)
);

export const MART_TABLES = [
  "variance_cells",
  "fact_metrics",
  "dim_services",
  "dim_entities",
  "dim_periods",
  "staging_observations",
] as const;

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Apply sql/schema.sql in one transaction.
 * `fresh` drops the mart tables (and the pivot view) first.
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  const schema = readFileSync(SCHEMA_PATH, "utf8");
  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    if (options?.fresh === true) {
      logger.info("Dropping existing mart tables (--fresh mode)...");
      await client.query(`DROP VIEW IF EXISTS ${PIVOT_VIEW}`);
      await client.query(
        `DROP TABLE IF EXISTS ${MART_TABLES.join(", ")} CASCADE`
      );
    }

    logger.info("Running PostgreSQL schema migration...");
    await client.query(schema);
    await client.query("COMMIT");

    logger.info("Schema migration completed successfully");
  } catch (error) {
    await client.query("ROLLBACK");
    logger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Check if the mart schema exists (fact table present)
 */
export async function hasSchema(): Promise<boolean> {
  const client = await pool.connect();
  try {
    const result = await client.query<{ count: number }>(`
      SELECT COUNT(*)::int as count
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name = 'fact_metrics'
    `);
    const row = result.rows[0];
    return row !== undefined && row.count > 0;
  } finally {
    client.release();
  }
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");

  try {
    await runMigration({ fresh });
    console.log("Migration completed successfully!");
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

const isMainModule = process.argv[1]?.includes("migrate");
if (isMainModule === true) {
  void main();
}
