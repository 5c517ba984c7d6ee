/**
 * Database constants
 */

/**
 * SQLite file used when DB_PATH is not set (relative to the working directory)
 */
export const DEFAULT_DB_PATH = "data/app.db";

/**
 * Directory holding the numbered .sql migrations
 */
export const MIGRATIONS_DIR = "migrations";
