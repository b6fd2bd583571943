// biome-ignore lint/style/useImportType: Database namespace needed for Database.Database type reference
import Database from "better-sqlite3";

/** Milliseconds a writer waits on a locked run log before SQLITE_BUSY. */
export const RUN_LOG_BUSY_TIMEOUT_MS = 5_000;

/**
 * Pragmas for the run log file. It may be opened by a `history` query while
 * a backup on the same host is appending its row, so the journal is WAL and
 * the writer waits out a short lock instead of failing the run.
 */
export function applySqlitePragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma(`busy_timeout = ${RUN_LOG_BUSY_TIMEOUT_MS}`);
}
