import { readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Pool } from "pg";
import { createLogger } from "../src/infra/logger.js";

const logger = createLogger("info", "payment-lifecycle-migrate");

// Files are applied in name order; each one must be idempotent.
async function listMigrations(directory: string): Promise<string[]> {
  const names = await readdir(directory);
  return names
    .filter((name) => name.endsWith(".sql"))
    .sort()
    .map((name) => join(directory, name));
}

async function main(): Promise<void> {
  const connectionString = process.env.PAYMENTS_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("PAYMENTS_POSTGRES_URL is required.");
  }

  const migrations = await listMigrations(resolve(process.cwd(), "sql"));
  const pool = new Pool({ connectionString });
  try {
    for (const migration of migrations) {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        await client.query(await readFile(migration, "utf8"));
        await client.query("COMMIT");
        logger.info({ migration }, "migration applied");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      } finally {
        client.release();
      }
    }
    logger.info({ count: migrations.length }, "db:migrate OK");
  } finally {
    await pool.end();
  }
}

await main();
