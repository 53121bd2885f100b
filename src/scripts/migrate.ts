/**
 * Database migrations
 * ===================
 * Applies `db/migrations/*.sql` in file-name order, once each.
 *
 * Usage: npm run db:migrate
 */

import "dotenv/config";

import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { disconnectDb, pool, withTransaction } from "../shared/db.js";
import { logger } from "../shared/logger.js";

const MIGRATIONS_DIR = fileURLToPath(new URL("../../db/migrations/", import.meta.url));

async function migrate(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name       TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await pool.query<{ name: string }>("SELECT name FROM schema_migrations");
  const done = new Set(applied.rows.map((r) => r.name));

  const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();
  let count = 0;

  for (const file of files) {
    if (done.has(file)) {continue;}
    const sql = await readFile(`${MIGRATIONS_DIR}${file}`, "utf8");
    await withTransaction(async (tx) => {
      await tx.query(sql);
      await tx.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
    });
    logger.info("Migration applied", { file });
    count++;
  }

  logger.info("Migrations complete", { applied: count, total: files.length });
}

migrate()
  .then(() => disconnectDb())
  .catch(async (err: unknown) => {
    logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
    await disconnectDb();
    process.exit(1);
  });
