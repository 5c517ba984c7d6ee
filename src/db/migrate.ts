/**
 * Migration runner
 *
 * Applies the numbered .sql files in migrations/ in filename order. Each
 * file runs in its own transaction together with its schema_migrations
 * row, so a failing file leaves no partial schema behind.
 *
 *   npm run migrate
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { openDb, closeDb } from "./connection";
import { MIGRATIONS_DIR } from "@/constants";
import * as logger from "@/logger";

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version TEXT NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

function listMigrationFiles(migrationsDir: string): string[] {
  try {
    return readdirSync(migrationsDir)
      .filter((file) => file.endsWith(".sql"))
      .sort();
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      migrationsDir,
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }
}

/**
 * Apply every pending migration to an open connection
 *
 * @returns Filenames applied by this call, in order
 */
export function applyMigrations(
  db: Database.Database,
  migrationsDir: string = join(process.cwd(), MIGRATIONS_DIR),
): string[] {
  db.exec(CREATE_MIGRATIONS_TABLE);

  const applied = new Set(
    db
      .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
      .all()
      .map((row) => row.version),
  );
  const pending = listMigrationFiles(migrationsDir).filter((file) => !applied.has(file));

  const record = db.prepare<[string]>("INSERT INTO schema_migrations (version) VALUES (?)");
  for (const file of pending) {
    const sql = readFileSync(join(migrationsDir, file), "utf-8");
    logger.debug("Applying migration", { migration: file });
    db.transaction(() => {
      db.exec(sql);
      record.run(file);
    })();
  }

  return pending;
}

/**
 * Migrate the database at DB_PATH and close it
 */
export function runMigrations(): void {
  const db = openDb();

  try {
    const applied = applyMigrations(db);
    if (applied.length === 0) {
      logger.info("No pending migrations");
    } else {
      logger.info("Migrations complete", { applied });
    }
  } finally {
    closeDb();
  }
}

if (require.main === module) {
  runMigrations();
}
