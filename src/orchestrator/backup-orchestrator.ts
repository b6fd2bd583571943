import type { BackupCatalog } from "../catalog/backup-catalog.js";
import { CatalogCorruptError } from "../catalog/errors.js";
import { type BackupEntry, type BackupType, entryIdFor } from "../catalog/types.js";
import {
  type Chain,
  type ChainStatus,
  chainEntries,
  chainStatus,
  chainTip,
  findChain,
  latestChain,
  resolveChains,
} from "../chain/chain-resolver.js";
import { logger } from "../config/logger.js";
import { type ClusterLock, LockTimeoutError, withClusterLock } from "../lock/cluster-lock.js";
import type { Notifier, Severity } from "../notify/notifier.js";
import type { PreparationEngine, PrepareOutcome } from "../prepare/preparation-engine.js";
import {
  classify,
  eligibleForPruning,
  type RetentionBucket,
  type RetentionPolicy,
} from "../retention/retention-engine.js";
import type { RunLogStore, RunOperation, RunOutcome } from "../run-log/run-log-store.js";
import { decide, NoIncrementalBaseError } from "../schedule/backup-scheduler.js";
import { utcDate } from "../schedule/periods.js";
import type { BackupStorage } from "../storage/backup-storage.js";
import type { BackupTool } from "../tool/backup-tool.js";
import type { BackupVerificationReport, BackupVerifier } from "../verify/backup-verifier.js";

const STDERR_TAIL_LINES = 5;

/** The backup tool exited non-zero; the partial artifact has been removed. */
export class BackupFailedError extends Error {
  readonly name = "BackupFailedError" as const;
  constructor(
    readonly entryId: string,
    readonly exitCode: number,
    readonly stderrTail: string,
  ) {
    super(`Backup ${entryId} failed with exit code ${exitCode}${stderrTail ? `: ${stderrTail}` : ""}`);
  }
}

/** The copy-back into the data directory exited non-zero. */
export class RestoreFailedError extends Error {
  readonly name = "RestoreFailedError" as const;
  constructor(
    readonly chainId: string,
    readonly exitCode: number,
    readonly stderrTail: string,
  ) {
    super(`Restore of ${chainId} failed with exit code ${exitCode}${stderrTail ? `: ${stderrTail}` : ""}`);
  }
}

/** Restore was asked for a chain that is not fully prepared. Nothing was changed. */
export class NotRestorableError extends Error {
  readonly name = "NotRestorableError" as const;
  constructor(
    readonly chainId: string,
    readonly reason: string,
  ) {
    super(`Chain ${chainId} is not restorable: ${reason}`);
  }
}

/** No chain matches the requested id or date. */
export class TargetNotFoundError extends Error {
  readonly name = "TargetNotFoundError" as const;
  constructor(readonly target: string) {
    super(`No backup chain matches ${target}`);
  }
}

/** Select a chain by anchor or member id, or by the UTC date (`YYYY-MM-DD`) its anchor was taken. */
export type ChainTarget = { id: string } | { date: string };

export interface BackupOrchestratorOptions {
  catalog: BackupCatalog;
  storage: BackupStorage;
  tool: BackupTool;
  lock: ClusterLock;
  lockTimeoutMs: number;
  notifier: Notifier;
  preparation: PreparationEngine;
  verifier: BackupVerifier;
  retention: RetentionPolicy;
  /** Default restore destination. */
  mysqlDataDir: string;
  runLog?: RunLogStore | null;
  clock?: () => Date;
}

export interface BackupRunReport {
  entry: BackupEntry;
  reason: string;
}

export interface RestoreReport {
  chainId: string;
  sourcePath: string;
  dataDir: string;
}

export interface RotationReport {
  startedAt: string;
  completedAt: string;
  /** Chains pruned, oldest first. */
  pruned: string[];
  failed: Array<{ chainId: string; error: string }>;
  orphans: string[];
  /** Chains left in place, by anchor id, with the bucket that keeps them (null when not retained). */
  retained: Record<string, RetentionBucket | null>;
}

export interface ChainSummary {
  id: string;
  status: ChainStatus;
  bucket: RetentionBucket | null;
  entries: Array<Pick<BackupEntry, "id" | "type" | "state" | "createdAt" | "sizeBytes" | "note">>;
}

export interface StatusReport {
  generatedAt: string;
  latestChain: string | null;
  chains: ChainSummary[];
  orphans: Array<{ entryId: string; reason: string }>;
}

interface RunContext {
  target: string | null;
  detail: string | null;
}

/**
 * Entry point for every mutating operation.
 *
 * Each run takes the cluster lock before it reads the catalog, and the
 * catalog is reloaded from storage under the lock, so what another node
 * wrote is always seen. Failures are logged, sent to the notifier and
 * rethrown.
 */
export class BackupOrchestrator {
  private readonly catalog: BackupCatalog;
  private readonly storage: BackupStorage;
  private readonly tool: BackupTool;
  private readonly lock: ClusterLock;
  private readonly lockTimeoutMs: number;
  private readonly notifier: Notifier;
  private readonly preparation: PreparationEngine;
  private readonly verifier: BackupVerifier;
  private readonly retention: RetentionPolicy;
  private readonly mysqlDataDir: string;
  private readonly runLog: RunLogStore | null;
  private readonly clock: () => Date;

  constructor(opts: BackupOrchestratorOptions) {
    this.catalog = opts.catalog;
    this.storage = opts.storage;
    this.tool = opts.tool;
    this.lock = opts.lock;
    this.lockTimeoutMs = opts.lockTimeoutMs;
    this.notifier = opts.notifier;
    this.preparation = opts.preparation;
    this.verifier = opts.verifier;
    this.retention = opts.retention;
    this.mysqlDataDir = opts.mysqlDataDir;
    this.runLog = opts.runLog ?? null;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Take the next backup: a FULL or an INCREMENTAL on the latest chain, as scheduled. */
  async runBackup(opts: { now?: Date; type?: BackupType } = {}): Promise<BackupRunReport> {
    return this.run("backup", async (ctx) => {
      const now = opts.now ?? this.clock();
      const { chains, orphans } = resolveChains(this.catalog.list());
      for (const orphan of orphans) logger.warn(orphan.message);

      const decision = decide(now, chains, { weekStart: this.retention.weekStart }, opts.type);
      const id = entryIdFor(now, decision.type);
      ctx.target = id;

      let basePath: string | null = null;
      let baseId: string | null = null;
      let reason: string;
      if (decision.type === "INCREMENTAL") {
        basePath = decision.parent.storagePath;
        baseId = decision.chain.id;
        reason = `incremental on ${decision.parent.id} in chain ${decision.chain.id}`;
        if (!basePath) throw new NoIncrementalBaseError(`${decision.parent.id} has no artifact`);
      } else {
        reason = decision.reason;
      }

      logger.info(`Starting ${decision.type} backup ${id}`, { reason });
      const targetPath = await this.storage.allocate(id);

      let entry: BackupEntry;
      try {
        const result = await this.tool.takeBackup({ targetPath, type: decision.type, basePath });
        if (result.exitCode !== 0) {
          throw new BackupFailedError(id, result.exitCode, tail(result.stderr));
        }
        entry = await this.catalog.append({
          id,
          type: decision.type,
          createdAt: now.toISOString(),
          baseId,
          storagePath: targetPath,
          sizeBytes: result.sizeBytes,
        });
      } catch (err) {
        await this.storage.discard(id);
        throw err;
      }

      ctx.detail = `${decision.type} ${entry.sizeBytes} bytes`;
      logger.info(`Backup ${id} complete`, { type: decision.type, sizeBytes: entry.sizeBytes });
      return { entry, reason };
    });
  }

  /** Prepare a chain for restore; defaults to the latest chain. */
  async runPrepare(opts: { target?: ChainTarget } = {}): Promise<PrepareOutcome> {
    return this.run("prepare", async (ctx) => {
      const { chains } = resolveChains(this.catalog.list());
      const chain = selectChain(chains, opts.target, latestChain);
      ctx.target = chain.id;

      const outcome = await this.preparation.prepare(chain);
      ctx.detail = `${outcome.applied.length} applied, ${outcome.skipped.length} skipped`;
      return outcome;
    });
  }

  /** Copy a prepared chain back into the data directory; defaults to the latest prepared chain. */
  async runRestore(opts: { target?: ChainTarget; dataDir?: string } = {}): Promise<RestoreReport> {
    return this.run("restore", async (ctx) => {
      const { chains } = resolveChains(this.catalog.list());
      const chain = selectChain(chains, opts.target, latestPrepared);
      ctx.target = chain.id;

      const status = chainStatus(chain);
      if (status !== "PREPARED") {
        throw new NotRestorableError(chain.id, `chain is ${status}`);
      }
      if (chainTip(chain).preparedMode !== "REDO_UNDO") {
        throw new NotRestorableError(chain.id, "final step was not applied with undo");
      }
      const sourcePath = chain.anchor.preparedPath;
      if (!sourcePath) {
        throw new NotRestorableError(chain.id, "anchor has no prepared path");
      }

      const dataDir = opts.dataDir ?? this.mysqlDataDir;
      logger.info(`Restoring chain ${chain.id} into ${dataDir}`, { sourcePath });
      const result = await this.tool.restore({ sourcePath, dataDir });
      if (result.exitCode !== 0) {
        throw new RestoreFailedError(chain.id, result.exitCode, tail(result.stderr));
      }

      ctx.detail = `restored into ${dataDir}`;
      logger.info(`Restore of ${chain.id} complete`);
      return { chainId: chain.id, sourcePath, dataDir };
    });
  }

  /**
   * Prune every chain the retention policy no longer keeps. A chain that
   * fails to prune is reported and skipped; the others still go.
   */
  async runRotate(opts: { now?: Date } = {}): Promise<RotationReport> {
    return this.run("rotate", async (ctx) => {
      const now = opts.now ?? this.clock();
      const startedAt = this.clock().toISOString();
      const { chains, orphans } = resolveChains(this.catalog.list());

      for (const orphan of orphans) {
        logger.warn(orphan.message);
        await this.safeNotify("warning", `Orphaned incremental ${orphan.entryId}`, orphan.message);
      }

      const buckets = classify(chains, this.retention, now);
      const eligible = eligibleForPruning(chains, this.retention, now);
      const pruned: string[] = [];
      const failed: RotationReport["failed"] = [];

      for (const chain of eligible) {
        try {
          await this.pruneChain(chain);
          pruned.push(chain.id);
        } catch (err) {
          const error = err instanceof Error ? err.message : String(err);
          logger.error(`Failed to prune chain ${chain.id}`, { err: error });
          failed.push({ chainId: chain.id, error });
          await this.safeNotify("error", `Pruning chain ${chain.id} failed`, error);
        }
      }

      const retained: RotationReport["retained"] = {};
      for (const chain of chains) {
        if (chain.anchor.state === "PRUNED" || pruned.includes(chain.id)) continue;
        retained[chain.id] = buckets.get(chain.id) ?? null;
      }

      const report: RotationReport = {
        startedAt,
        completedAt: this.clock().toISOString(),
        pruned,
        failed,
        orphans: orphans.map((o) => o.entryId),
        retained,
      };

      const summary = `${pruned.length} pruned, ${failed.length} failed, ${orphans.length} orphaned`;
      ctx.detail = summary;
      logger.info(`Rotation complete: ${summary}`);
      await this.safeNotify(
        failed.length > 0 ? "warning" : "info",
        `Rotation: ${summary}`,
        [
          `Pruned: ${pruned.join(", ") || "none"}`,
          ...failed.map((f) => `Failed ${f.chainId}: ${f.error}`),
          ...orphans.map((o) => o.message),
        ].join("\n"),
      );
      return report;
    });
  }

  /** Check every live artifact against its recorded type and LSN range. */
  async runVerify(): Promise<BackupVerificationReport> {
    return this.run("verify", async (ctx) => {
      const { chains } = resolveChains(this.catalog.list());
      const report = await this.verifier.verify(chains);
      ctx.detail = `${report.passed} passed, ${report.failed} failed`;

      if (report.failed > 0) {
        await this.safeNotify(
          "warning",
          `Verification: ${report.failed} of ${report.totalChecked} entries failed`,
          report.results
            .filter((r) => !r.valid)
            .map((r) => `${r.entryId}: ${r.error ?? "invalid"}`)
            .join("\n"),
        );
      }
      return report;
    });
  }

  /** Read-only view of the catalog. Takes no lock. */
  async status(now: Date = this.clock()): Promise<StatusReport> {
    await this.catalog.load();
    const { chains, orphans } = resolveChains(this.catalog.list());
    const buckets = classify(chains, this.retention, now);
    const latest = latestChain(chains);

    return {
      generatedAt: now.toISOString(),
      latestChain: latest?.id ?? null,
      chains: chains.map((chain) => ({
        id: chain.id,
        status: chainStatus(chain),
        bucket: buckets.get(chain.id) ?? null,
        entries: chainEntries(chain).map((e) => ({
          id: e.id,
          type: e.type,
          state: e.state,
          createdAt: e.createdAt,
          sizeBytes: e.sizeBytes,
          note: e.note,
        })),
      })),
      orphans: orphans.map((o) => ({ entryId: o.entryId, reason: o.reason })),
    };
  }

  /** Remove artifacts newest-first, tombstoning each entry as it goes. */
  private async pruneChain(chain: Chain): Promise<void> {
    const entries = chainEntries(chain).reverse();
    logger.info(`Pruning chain ${chain.id}`, { entries: entries.length });

    for (const entry of entries) {
      if (entry.state === "PRUNED") continue;
      if (entry.storagePath) await this.storage.removeArtifact(entry.storagePath);
      await this.catalog.mark(entry.id, "PRUNED", { note: "rotated" });
    }
    await this.storage.discardWorkCopies(chain.id);
  }

  private async run<T>(operation: RunOperation, fn: (ctx: RunContext) => Promise<T>): Promise<T> {
    const startedAt = this.clock();
    const ctx: RunContext = { target: null, detail: null };

    try {
      const result = await withClusterLock(this.lock, this.lockTimeoutMs, async () => {
        await this.catalog.load();
        return fn(ctx);
      });
      this.record(operation, startedAt, "success", ctx);
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const outcome: RunOutcome = err instanceof LockTimeoutError ? "lock-timeout" : "failure";
      logger.error(`${operation} failed`, { target: ctx.target, err: message });

      await this.safeNotify(
        severityOf(err),
        `${operation} failed${ctx.target ? ` for ${ctx.target}` : ""}`,
        `${err instanceof Error ? err.name : "Error"}: ${message}`,
      );
      this.record(operation, startedAt, outcome, { target: ctx.target, detail: message });
      throw err;
    }
  }

  private async safeNotify(severity: Severity, subject: string, body: string): Promise<void> {
    try {
      await this.notifier.notify(severity, subject, body);
    } catch (err) {
      logger.error(`Notification delivery failed: ${subject}`, {
        err: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private record(operation: RunOperation, startedAt: Date, outcome: RunOutcome, ctx: RunContext): void {
    if (!this.runLog) return;
    try {
      this.runLog.record({
        operation,
        startedAt,
        finishedAt: this.clock(),
        outcome,
        target: ctx.target,
        detail: ctx.detail,
      });
    } catch (err) {
      logger.error("Failed to write run log", { operation, err: err instanceof Error ? err.message : String(err) });
    }
  }
}

function selectChain(
  chains: readonly Chain[],
  target: ChainTarget | undefined,
  fallback: (chains: readonly Chain[]) => Chain | null,
): Chain {
  if (!target) {
    const chain = fallback(chains);
    if (!chain) throw new TargetNotFoundError("latest");
    return chain;
  }

  if ("id" in target) {
    const chain = findChain(chains, target.id);
    if (!chain) throw new TargetNotFoundError(target.id);
    return chain;
  }

  // Most recent live anchor taken on that day.
  const sameDay = chains.filter(
    (c) => c.anchor.state !== "PRUNED" && utcDate(new Date(c.anchor.createdAt)) === target.date,
  );
  const chain = sameDay[sameDay.length - 1];
  if (!chain) throw new TargetNotFoundError(target.date);
  return chain;
}

function latestPrepared(chains: readonly Chain[]): Chain | null {
  const prepared = chains.filter((c) => chainStatus(c) === "PREPARED");
  return prepared[prepared.length - 1] ?? null;
}

function severityOf(err: unknown): Severity {
  if (err instanceof LockTimeoutError) return "warning";
  if (err instanceof CatalogCorruptError) return "critical";
  return "error";
}

function tail(text: string): string {
  return text.trimEnd().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
}
