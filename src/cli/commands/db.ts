import ora from "ora";

import {
  checkConnection,
  closeConnection,
  db as database,
  getDatabaseUrl,
  getPoolStats,
} from "../../db/connection.js";
import { hasSchema, runMigration } from "../../db/migrate.js";
import { KyselyWarehouseStore } from "../../db/warehouse.js";
import { displayTableCounts, errorMessage } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Apply sql/schema.sql")
    .option("--fresh", "Drop the mart tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        if (options.fresh === true) {
          spinner.text = "Dropping existing tables...";
        }

        await runMigration({ fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        const counts = await new KyselyWarehouseStore(database).tableCounts();
        console.log("\nTables:");
        displayTableCounts(counts);
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show row counts")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const connected = await checkConnection();

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${getDatabaseUrl()}`);

        const poolStats = getPoolStats();
        console.log("\nPool statistics:");
        console.log(`  Total connections: ${String(poolStats.totalCount)}`);
        console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
        console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);

        const schemaExists = await hasSchema();
        if (!schemaExists) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          console.log("\nTable statistics:");
          displayTableCounts(
            await new KyselyWarehouseStore(database).tableCounts()
          );
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db reset
  db.command("reset")
    .description("Reset database (drop and recreate the mart tables)")
    .action(async () => {
      const spinner = ora("Resetting database...").start();

      try {
        await runMigration({ fresh: true });
        spinner.succeed("Database reset completed");
      } catch (error) {
        spinner.fail(`Reset failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
