/**
 * Artifact integrity verification.
 *
 * Checks what can be checked without a restore: the artifact directory
 * exists, its `xtrabackup_checkpoints` file parses and names the right
 * backup type, and consecutive RAW deltas of a chain line up on LSN.
 * Failures are marked CORRUPT together with every later entry of the
 * chain, since those were taken on top of the broken one.
 */

import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { BackupCatalog } from "../catalog/backup-catalog.js";
import type { BackupEntry, BackupType } from "../catalog/types.js";
import { type Chain, chainEntries } from "../chain/chain-resolver.js";
import { logger } from "../config/logger.js";

export const CHECKPOINTS_FILE = "xtrabackup_checkpoints";

/** `backup_type` values the tool writes for each kind of artifact, before and after prepare. */
const ACCEPTED_TYPES: Record<BackupType, readonly string[]> = {
  FULL: ["full-backuped", "full-prepared", "log-applied"],
  INCREMENTAL: ["incremental"],
};

export interface Checkpoints {
  backupType: string;
  /** Decimal strings; LSNs can exceed the safe integer range. */
  fromLsn: string;
  toLsn: string;
}

export interface EntryVerificationResult {
  entryId: string;
  valid: boolean;
  error?: string;
}

export interface BackupVerificationReport {
  verifiedAt: string;
  totalChecked: number;
  passed: number;
  failed: number;
  results: EntryVerificationResult[];
}

/** Parse the `key = value` lines of an `xtrabackup_checkpoints` file. */
export function parseCheckpoints(text: string): Checkpoints {
  const fields = new Map<string, string>();
  for (const line of text.split("\n")) {
    const eq = line.indexOf("=");
    if (eq === -1) continue;
    fields.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }

  const backupType = fields.get("backup_type");
  const fromLsn = fields.get("from_lsn");
  const toLsn = fields.get("to_lsn");
  if (!backupType) throw new Error(`${CHECKPOINTS_FILE} has no backup_type`);
  if (!fromLsn || !/^\d+$/.test(fromLsn)) throw new Error(`${CHECKPOINTS_FILE} has no valid from_lsn`);
  if (!toLsn || !/^\d+$/.test(toLsn)) throw new Error(`${CHECKPOINTS_FILE} has no valid to_lsn`);
  return { backupType, fromLsn, toLsn };
}

export class BackupVerifier {
  private readonly catalog: BackupCatalog;
  private readonly clock: () => Date;

  constructor(opts: { catalog: BackupCatalog; clock?: () => Date }) {
    this.catalog = opts.catalog;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Verify every live entry of the given chains, marking failures CORRUPT. */
  async verify(chains: readonly Chain[]): Promise<BackupVerificationReport> {
    const verifiedAt = this.clock().toISOString();
    const results: EntryVerificationResult[] = [];

    for (const chain of chains) {
      results.push(...(await this.verifyChain(chain)));
    }

    const failed = results.filter((r) => !r.valid);
    if (failed.length > 0) {
      logger.warn(`BackupVerifier: ${failed.length}/${results.length} entries failed verification`, {
        failed: failed.map((r) => r.entryId),
      });
    } else {
      logger.info(`BackupVerifier: all ${results.length} entries verified OK`);
    }

    return {
      verifiedAt,
      totalChecked: results.length,
      passed: results.length - failed.length,
      failed: failed.length,
      results,
    };
  }

  private async verifyChain(chain: Chain): Promise<EntryVerificationResult[]> {
    const entries = chainEntries(chain).filter((e) => e.state !== "PRUNED");
    const results: EntryVerificationResult[] = [];
    let previous: { entry: BackupEntry; checkpoints: Checkpoints } | null = null;
    let brokenAt: string | null = null;

    for (const entry of entries) {
      if (brokenAt) {
        const error = `built on ${brokenAt}, which failed verification`;
        results.push({ entryId: entry.id, valid: false, error });
        await this.flag(entry, error);
        continue;
      }

      let checkpoints: Checkpoints;
      try {
        checkpoints = await this.readCheckpoints(entry);
        checkType(entry, checkpoints);
        if (previous && previous.entry.state === "RAW" && entry.state === "RAW") {
          checkContinuity(previous.entry, previous.checkpoints, checkpoints);
        }
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        logger.warn(`BackupVerifier: ${entry.id} failed`, { err: error });
        results.push({ entryId: entry.id, valid: false, error });
        await this.flag(entry, error);
        brokenAt = entry.id;
        continue;
      }

      logger.debug(`BackupVerifier: ${entry.id} OK`, { toLsn: checkpoints.toLsn });
      results.push({ entryId: entry.id, valid: true });
      previous = { entry, checkpoints };
    }

    return results;
  }

  private async readCheckpoints(entry: BackupEntry): Promise<Checkpoints> {
    if (!entry.storagePath) throw new Error("entry has no artifact path");
    try {
      const info = await stat(entry.storagePath);
      if (!info.isDirectory()) throw new Error(`artifact ${entry.storagePath} is not a directory`);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new Error(`artifact ${entry.storagePath} is missing`);
      }
      throw err;
    }

    let text: string;
    try {
      text = await readFile(join(entry.storagePath, CHECKPOINTS_FILE), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new Error(`${CHECKPOINTS_FILE} is missing`);
      }
      throw err;
    }
    return parseCheckpoints(text);
  }

  private async flag(entry: BackupEntry, error: string): Promise<void> {
    if (entry.state === "CORRUPT") return;
    await this.catalog.mark(entry.id, "CORRUPT", { note: `verification failed: ${error}` });
  }
}

function checkType(entry: BackupEntry, checkpoints: Checkpoints): void {
  if (!ACCEPTED_TYPES[entry.type].includes(checkpoints.backupType)) {
    throw new Error(`backup_type ${checkpoints.backupType} does not match a ${entry.type} backup`);
  }
}

function checkContinuity(previous: BackupEntry, before: Checkpoints, after: Checkpoints): void {
  if (BigInt(after.fromLsn) !== BigInt(before.toLsn)) {
    throw new Error(`from_lsn ${after.fromLsn} does not continue ${previous.id} (to_lsn ${before.toLsn})`);
  }
}
