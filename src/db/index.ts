import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { applySqlitePragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

export type DrizzleDb = BetterSQLite3Database<Schema>;

/** Create the run log table and indexes if they don't exist. */
export function initRunLogSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS run_log (
      id TEXT PRIMARY KEY,
      operation TEXT NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      outcome TEXT NOT NULL CHECK (outcome IN ('success', 'failure', 'lock-timeout')),
      target TEXT,
      detail TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_run_log_started
      ON run_log (started_at);

    CREATE INDEX IF NOT EXISTS idx_run_log_operation
      ON run_log (operation, started_at);
  `);
}

/**
 * Open (creating if needed) a SQLite database at `path` with the run log
 * schema applied. Pass ":memory:" for tests.
 */
export function openDb(path: string): { db: DrizzleDb; sqlite: Database.Database } {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const sqlite = new Database(path);
  if (path !== ":memory:") applySqlitePragmas(sqlite);
  initRunLogSchema(sqlite);
  return { db: drizzle(sqlite, { schema }), sqlite };
}

export { schema };
