import type { BackupCatalog } from "../catalog/backup-catalog.js";
import type { BackupEntry, PrepareMode } from "../catalog/types.js";
import { type Chain, chainEntries } from "../chain/chain-resolver.js";
import { logger } from "../config/logger.js";
import type { BackupStorage } from "../storage/backup-storage.js";
import type { BackupTool } from "../tool/backup-tool.js";

export interface PreparationEngineOptions {
  catalog: BackupCatalog;
  tool: BackupTool;
  storage: BackupStorage;
  /**
   * Prepare copies under the storage work directory instead of the RAW
   * artifacts themselves. Requires `storage.workDir`.
   */
  useWorkingCopy: boolean;
  /** An unfinished marker younger than this means another run may still be busy. */
  graceMs: number;
  clock?: () => Date;
}

export interface PrepareOutcome {
  chainId: string;
  /** Entries that had a tool step applied in this call. */
  applied: string[];
  /** Entries already PREPARED before this call. */
  skipped: string[];
  /** Directory holding the restorable result. */
  preparedPath: string | null;
}

/** The chain contains entries that can no longer be prepared. */
export class ChainNotPreparableError extends Error {
  readonly name = "ChainNotPreparableError" as const;
  constructor(
    readonly chainId: string,
    readonly reason: string,
  ) {
    super(`Chain ${chainId} cannot be prepared: ${reason}`);
  }
}

/** A step of the external preparation failed; the entry and its successors are now CORRUPT. */
export class PreparationFailedError extends Error {
  readonly name = "PreparationFailedError" as const;
  constructor(
    readonly entryId: string,
    readonly reason: string,
  ) {
    super(`Preparation failed at ${entryId}: ${reason}`);
  }
}

/** A preparation marker newer than the grace period is still on the anchor. */
export class PreparationInProgressError extends Error {
  readonly name = "PreparationInProgressError" as const;
  constructor(
    readonly chainId: string,
    readonly startedAt: string,
  ) {
    super(`Chain ${chainId} has a preparation in progress since ${startedAt}`);
  }
}

/**
 * Drives the backup tool's two-phase prepare over a chain.
 *
 * The anchor and every delta but the last are applied redo-only; the last
 * step also rolls back uncommitted transactions. Entries are marked
 * PREPARED one step at a time, so an interrupted or failed run resumes at
 * the first entry that is not PREPARED. An interrupted run leaves its entry
 * RAW, never PREPARED.
 */
export class PreparationEngine {
  private readonly catalog: BackupCatalog;
  private readonly tool: BackupTool;
  private readonly storage: BackupStorage;
  private readonly useWorkingCopy: boolean;
  private readonly graceMs: number;
  private readonly clock: () => Date;

  constructor(opts: PreparationEngineOptions) {
    if (opts.useWorkingCopy && !opts.storage.workDir) {
      throw new Error("Working-copy preparation requires a work directory");
    }
    this.catalog = opts.catalog;
    this.tool = opts.tool;
    this.storage = opts.storage;
    this.useWorkingCopy = opts.useWorkingCopy;
    this.graceMs = opts.graceMs;
    this.clock = opts.clock ?? (() => new Date());
  }

  async prepare(chain: Chain): Promise<PrepareOutcome> {
    const entries = this.current(chain);
    const anchor = entries[0];

    const pruned = entries.find((e) => e.state === "PRUNED");
    if (pruned) {
      throw new ChainNotPreparableError(chain.id, `entry ${pruned.id} has been pruned`);
    }

    if (anchor.preparation) {
      await this.recoverInterrupted(chain, anchor.preparation.startedAt, anchor.preparation.entryId);
    }

    const fresh = this.current(chain);
    let start = fresh.findIndex((e) => e.state !== "PREPARED");

    if (start === -1) {
      logger.info(`Chain ${chain.id} already prepared; nothing to do`);
      return { chainId: chain.id, applied: [], skipped: fresh.map((e) => e.id), preparedPath: fresh[0].preparedPath };
    }

    if (start > 0 && fresh[start - 1].preparedMode === "REDO_UNDO") {
      const last = fresh[start - 1];
      if (this.useWorkingCopy && last.preparedPath !== fresh[0].storagePath) {
        // Only the copies were finalised; the artifacts themselves can be prepared again.
        logger.info(`Chain ${chain.id} gained deltas after ${last.id} was finalised; re-preparing from fresh copies`);
        start = 0;
      } else {
        const reason = `${last.id} was already finalised with undo; later deltas cannot be applied`;
        await this.markCorruptFrom(fresh, start, reason);
        throw new PreparationFailedError(fresh[start].id, reason);
      }
    }

    const skipped = fresh.slice(0, start).map((e) => e.id);
    logger.info(`Preparing chain ${chain.id}`, {
      pending: fresh.length - start,
      skipped: skipped.length,
      workingCopy: this.useWorkingCopy,
    });

    const applied: string[] = [];
    let targetPath = start === 0 ? null : fresh[0].preparedPath;
    if (start > 0 && !targetPath) {
      throw new ChainNotPreparableError(chain.id, `anchor ${chain.id} is PREPARED but has no prepared path`);
    }

    for (let i = start; i < fresh.length; i++) {
      const entry = fresh[i];
      const mode: PrepareMode = i === fresh.length - 1 ? "REDO_UNDO" : "REDO_ONLY";

      await this.catalog.setPreparationMarker(chain.id, {
        startedAt: this.clock().toISOString(),
        entryId: entry.id,
      });

      let failure: string | null = null;
      try {
        const source = await this.stage(chain.id, entry);
        if (i === 0) targetPath = source;
        if (!targetPath) throw new Error("no accumulated target to apply onto");

        const result = await this.tool.prepareStep({
          targetPath,
          mode,
          incrementalPath: i === 0 ? null : source,
        });
        if (result.exitCode !== 0) {
          failure = `${mode === "REDO_ONLY" ? "redo-only" : "redo+undo"} step exited with code ${result.exitCode}`;
        }
      } catch (err) {
        failure = err instanceof Error ? err.message : String(err);
      }

      if (failure !== null) {
        await this.markCorruptFrom(fresh, i, failure);
        await this.catalog.setPreparationMarker(chain.id, null);
        logger.error(`Preparation of chain ${chain.id} failed at ${entry.id}`, { reason: failure });
        throw new PreparationFailedError(entry.id, failure);
      }

      await this.catalog.mark(entry.id, "PREPARED", { preparedPath: targetPath, preparedMode: mode, note: null });
      applied.push(entry.id);
      logger.info(`Prepared ${entry.id} (${mode})`);
    }

    await this.catalog.setPreparationMarker(chain.id, null);
    logger.info(`Chain ${chain.id} prepared`, { applied: applied.length, preparedPath: targetPath });

    return { chainId: chain.id, applied, skipped, preparedPath: targetPath };
  }

  /**
   * Handle a marker left by a run that never finished. Within the grace
   * period the run might still be alive, so refuse. After it, the
   * interrupted entry and every later entry not yet PREPARED become CORRUPT
   * and are retried below.
   */
  private async recoverInterrupted(chain: Chain, startedAt: string, entryId: string): Promise<void> {
    const ageMs = this.clock().getTime() - Date.parse(startedAt);
    if (ageMs < this.graceMs) {
      throw new PreparationInProgressError(chain.id, startedAt);
    }

    logger.warn(`Chain ${chain.id}: preparation interrupted at ${entryId} (started ${startedAt}); re-flagging`);
    const entries = this.current(chain);
    const from = entries.findIndex((e) => e.id === entryId);
    if (from !== -1) {
      for (const entry of entries.slice(from)) {
        if (entry.state === "PREPARED") continue;
        await this.catalog.mark(entry.id, "CORRUPT", { note: "preparation interrupted" });
      }
    }
    await this.catalog.setPreparationMarker(chain.id, null);
  }

  /**
   * Where the tool should read this entry from: the artifact itself, or a
   * fresh copy in the work directory.
   */
  private async stage(chainId: string, entry: BackupEntry): Promise<string> {
    if (!entry.storagePath) throw new Error(`entry ${entry.id} has no artifact`);
    if (!this.useWorkingCopy) return entry.storagePath;

    const copy = this.storage.workCopyPath(chainId, entry.id);
    await this.storage.copyArtifact(entry.storagePath, copy);
    return copy;
  }

  private async markCorruptFrom(entries: BackupEntry[], from: number, note: string): Promise<void> {
    for (const entry of entries.slice(from)) {
      await this.catalog.mark(entry.id, "CORRUPT", { note });
    }
  }

  /** Re-read chain members from the catalog; the caller's copy may be stale. */
  private current(chain: Chain): BackupEntry[] {
    return chainEntries(chain).map((e) => this.catalog.get(e.id) ?? e);
  }
}
