import type Database from "better-sqlite3";
import { BackupCatalog } from "./catalog/backup-catalog.js";
import { FsBackupMetadataRepository } from "./catalog/fs-metadata-repository.js";
import type { Config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { openDb } from "./db/index.js";
import { FileClusterLock } from "./lock/file-cluster-lock.js";
import { EmailNotifier } from "./notify/email-notifier.js";
import { CompositeNotifier, LogNotifier, type Notifier } from "./notify/notifier.js";
import { BackupOrchestrator } from "./orchestrator/backup-orchestrator.js";
import { PreparationEngine } from "./prepare/preparation-engine.js";
import { RunLogStore } from "./run-log/run-log-store.js";
import { BackupStorage } from "./storage/backup-storage.js";
import { XtraBackupTool } from "./tool/xtrabackup-tool.js";
import { BackupVerifier } from "./verify/backup-verifier.js";

export interface Services {
  orchestrator: BackupOrchestrator;
  runLog: RunLogStore | null;
  /** Close the run log database, if one was opened. */
  close(): void;
}

/** Logs always; email as well once an API key and recipient are configured. */
export function buildNotifier(config: Config): Notifier {
  const channels: Notifier[] = [new LogNotifier()];
  const { resendApiKey, to, from } = config.notification;
  if (resendApiKey && to) {
    channels.push(new EmailNotifier({ apiKey: resendApiKey, from, to }));
  } else if (resendApiKey) {
    logger.warn("RESEND_API_KEY is set but no NOTIFICATION_EMAIL; email notifications disabled");
  }
  return new CompositeNotifier(channels);
}

export interface BuildServicesOptions {
  /** Cancels the running tool step and any wait for the cluster lock. */
  signal?: AbortSignal;
}

/** Wire every component from a validated configuration. */
export function buildServices(config: Config, opts: BuildServicesOptions = {}): Services {
  const storage = new BackupStorage(config.backupRoot, { workDir: config.prepare.workDir });
  const catalog = new BackupCatalog({ repo: new FsBackupMetadataRepository(storage) });
  const tool = new XtraBackupTool({
    binary: config.tool.binary,
    defaultsFile: config.tool.defaultsFile,
    compress: config.tool.compress,
    parallel: config.tool.parallel,
    timeoutMs: config.tool.timeoutMs,
    sizeOf: (path) => storage.sizeOf(path),
    signal: opts.signal,
  });

  let sqlite: Database.Database | null = null;
  let runLog: RunLogStore | null = null;
  if (config.runLogPath) {
    const opened = openDb(config.runLogPath);
    sqlite = opened.sqlite;
    runLog = new RunLogStore(opened.db);
  }

  const orchestrator = new BackupOrchestrator({
    catalog,
    storage,
    tool,
    lock: new FileClusterLock({
      path: storage.lockPath(),
      pollIntervalMs: config.lock.pollIntervalMs,
      staleAfterMs: config.lock.staleAfterMs,
      signal: opts.signal,
    }),
    lockTimeoutMs: config.lock.timeoutMs,
    notifier: buildNotifier(config),
    preparation: new PreparationEngine({
      catalog,
      tool,
      storage,
      useWorkingCopy: storage.workDir !== null,
      graceMs: config.prepare.graceMs,
    }),
    verifier: new BackupVerifier({ catalog }),
    retention: config.retention,
    mysqlDataDir: config.mysqlDataDir,
    runLog,
  });

  return {
    orchestrator,
    runLog,
    close: () => {
      sqlite?.close();
    },
  };
}
