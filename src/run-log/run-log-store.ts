import { randomUUID } from "node:crypto";
import { desc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { runLog } from "../db/schema/run-log.js";

export const RUN_OPERATIONS = ["backup", "prepare", "restore", "rotate", "verify"] as const;
export type RunOperation = (typeof RUN_OPERATIONS)[number];

export type RunOutcome = "success" | "failure" | "lock-timeout";

export interface RunLogEntry {
  id: string;
  operation: string;
  startedAt: string;
  finishedAt: string;
  outcome: string;
  target: string | null;
  detail: string | null;
}

export class RunLogStore {
  private readonly db: DrizzleDb;

  constructor(db: DrizzleDb) {
    this.db = db;
  }

  /** Record a finished invocation. Returns the created entry. */
  record(params: {
    operation: RunOperation;
    startedAt: Date;
    finishedAt?: Date;
    outcome: RunOutcome;
    target?: string | null;
    detail?: string | null;
  }): RunLogEntry {
    const entry: RunLogEntry = {
      id: randomUUID(),
      operation: params.operation,
      startedAt: params.startedAt.toISOString(),
      finishedAt: (params.finishedAt ?? new Date()).toISOString(),
      outcome: params.outcome,
      target: params.target ?? null,
      detail: params.detail ?? null,
    };

    this.db.insert(runLog).values(entry).run();

    return entry;
  }

  /** Most recent invocations first, optionally for one operation. */
  list(opts: { operation?: RunOperation; limit?: number } = {}): RunLogEntry[] {
    const limit = opts.limit ?? 50;
    return this.db
      .select()
      .from(runLog)
      .where(opts.operation ? eq(runLog.operation, opts.operation) : undefined)
      .orderBy(desc(runLog.startedAt), desc(runLog.finishedAt))
      .limit(limit)
      .all();
  }

  /** Get a single invocation by ID. */
  get(id: string): RunLogEntry | null {
    return this.db.select().from(runLog).where(eq(runLog.id, id)).get() ?? null;
  }
}
