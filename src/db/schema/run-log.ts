import { index, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * One row per orchestrator invocation. Audit trail only: the backup
 * catalog never reads it.
 */
export const runLog = sqliteTable(
  "run_log",
  {
    id: text("id").primaryKey(),
    /** backup | prepare | restore | rotate | verify */
    operation: text("operation").notNull(),
    /** ISO timestamp the invocation started */
    startedAt: text("started_at").notNull(),
    /** ISO timestamp the invocation finished */
    finishedAt: text("finished_at").notNull(),
    /** success | failure | lock-timeout */
    outcome: text("outcome").notNull(),
    /** Entry or chain id the run acted on, when there was one */
    target: text("target"),
    /** Human-readable summary or failure cause */
    detail: text("detail"),
  },
  (table) => [
    index("idx_run_log_started").on(table.startedAt),
    index("idx_run_log_operation").on(table.operation, table.startedAt),
  ],
);
