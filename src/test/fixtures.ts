import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type BackupEntry, type BackupType, entryIdFor } from "../catalog/types.js";
import type { Notifier, Severity } from "../notify/notifier.js";
import type {
  BackupTool,
  PrepareStepRequest,
  RestoreRequest,
  TakeBackupRequest,
  ToolResult,
} from "../tool/backup-tool.js";

/** Build a catalog entry; the id is derived from `createdAt` and `type`. */
export function makeEntry(createdAt: string, type: BackupType, overrides: Partial<BackupEntry> = {}): BackupEntry {
  const date = new Date(createdAt);
  const id = entryIdFor(date, type);
  return {
    id,
    type,
    createdAt: date.toISOString(),
    baseId: null,
    state: "RAW",
    storagePath: `/backups/${id}/data`,
    sizeBytes: 1024,
    preparedPath: null,
    preparedMode: null,
    note: null,
    updatedAt: null,
    preparation: null,
    ...overrides,
  };
}

export function full(createdAt: string, overrides: Partial<BackupEntry> = {}): BackupEntry {
  return makeEntry(createdAt, "FULL", overrides);
}

export function incr(createdAt: string, base: BackupEntry, overrides: Partial<BackupEntry> = {}): BackupEntry {
  return makeEntry(createdAt, "INCREMENTAL", { baseId: base.id, ...overrides });
}

/** A PREPARED chain member, as a completed in-place preparation leaves it. */
export function prepared(entry: BackupEntry, anchor: BackupEntry, mode: "REDO_ONLY" | "REDO_UNDO"): BackupEntry {
  return { ...entry, state: "PREPARED", preparedPath: anchor.storagePath, preparedMode: mode };
}

/** Scriptable stand-in for xtrabackup that records every request. */
export class FakeBackupTool implements BackupTool {
  readonly backups: TakeBackupRequest[] = [];
  readonly steps: PrepareStepRequest[] = [];
  readonly restores: RestoreRequest[] = [];

  backupResult: ToolResult & { sizeBytes: number } = { exitCode: 0, stderr: "", sizeBytes: 4096 };
  restoreResult: ToolResult = { exitCode: 0, stderr: "" };
  /** Exit code for each prepare step; succeeds by default. */
  prepareExit: (req: PrepareStepRequest) => number = () => 0;
  /** Awaited inside takeBackup before it returns. */
  duringBackup: (req: TakeBackupRequest) => Promise<void> = async () => {};

  async takeBackup(req: TakeBackupRequest): Promise<ToolResult & { sizeBytes: number }> {
    this.backups.push(req);
    await this.duringBackup(req);
    return { ...this.backupResult };
  }

  async prepareStep(req: PrepareStepRequest): Promise<ToolResult> {
    this.steps.push(req);
    const exitCode = this.prepareExit(req);
    return { exitCode, stderr: exitCode === 0 ? "" : "prepare failed" };
  }

  async restore(req: RestoreRequest): Promise<ToolResult> {
    this.restores.push(req);
    return { ...this.restoreResult };
  }
}

export interface SentNotification {
  severity: Severity;
  subject: string;
  body: string;
}

export class RecordingNotifier implements Notifier {
  readonly sent: SentNotification[] = [];

  async notify(severity: Severity, subject: string, body: string): Promise<void> {
    this.sent.push({ severity, subject, body });
  }
}

/** Fresh directory under the OS temp dir, plus its cleanup. */
export async function makeTempDir(prefix: string): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
