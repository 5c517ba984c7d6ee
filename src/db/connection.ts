/**
 * SQLite connection
 *
 * One process-wide better-sqlite3 handle, read by every repository through
 * getDb(). Stages open it once; tests swap in their own handle.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { DEFAULT_DB_PATH } from "@/constants";

let current: Database.Database | null = null;

/**
 * DB_PATH, or the default file under the working directory. The parent
 * directory is created for file databases.
 */
export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const dbPath = env.DB_PATH || resolve(process.cwd(), DEFAULT_DB_PATH);
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  return dbPath;
}

/**
 * Pragmas every connection runs with: enforced foreign keys, and WAL so a
 * run can be inspected while it writes
 */
export function configureConnection(db: Database.Database): Database.Database {
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");
  return db;
}

/** Open the shared connection, or return it when already open */
export function openDb(): Database.Database {
  if (!current) {
    current = configureConnection(new Database(resolveDbPath()));
  }
  return current;
}

export function closeDb(): void {
  current?.close();
  current = null;
}

export function getDb(): Database.Database {
  if (!current) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return current;
}

/**
 * Replace the shared connection with a test database (null to detach)
 *
 * @internal
 */
export function setDbForTesting(db: Database.Database | null): void {
  current = db;
}
