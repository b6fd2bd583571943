export { BackupCatalog, type MarkDetails } from "./catalog/backup-catalog.js";
export { InvalidTransitionError, isValidTransition, VALID_TRANSITIONS } from "./catalog/entry-state-machine.js";
export { CatalogCorruptError, DuplicateIdError, EntryNotFoundError } from "./catalog/errors.js";
export { FsBackupMetadataRepository } from "./catalog/fs-metadata-repository.js";
export { InMemoryBackupMetadataRepository } from "./catalog/in-memory-metadata-repository.js";
export type { IBackupMetadataRepository, ScannedMetadata } from "./catalog/repository-types.js";
export {
  type BackupEntry,
  type BackupType,
  type EntryState,
  entryIdFor,
  type NewBackupEntry,
  type PrepareMode,
} from "./catalog/types.js";
export {
  type Chain,
  type ChainStatus,
  chainStatus,
  chainsOf,
  latestChain,
  OrphanIncrementalError,
  resolveChains,
} from "./chain/chain-resolver.js";
export { type Config, ConfigError, loadConfig, parseConfig } from "./config/index.js";
export { configureLogger, logger } from "./config/logger.js";
export { type ClusterLock, LockTimeoutError, type LockToken, withClusterLock } from "./lock/cluster-lock.js";
export { FileClusterLock } from "./lock/file-cluster-lock.js";
export { EmailNotifier } from "./notify/email-notifier.js";
export { CompositeNotifier, LogNotifier, type Notifier, type Severity } from "./notify/notifier.js";
export {
  BackupFailedError,
  BackupOrchestrator,
  type ChainTarget,
  NotRestorableError,
  RestoreFailedError,
  TargetNotFoundError,
} from "./orchestrator/backup-orchestrator.js";
export {
  ChainNotPreparableError,
  PreparationEngine,
  PreparationFailedError,
  PreparationInProgressError,
} from "./prepare/preparation-engine.js";
export {
  classify,
  eligibleForPruning,
  type RetentionBucket,
  type RetentionPolicy,
} from "./retention/retention-engine.js";
export { RunLogStore } from "./run-log/run-log-store.js";
export { decide, NoIncrementalBaseError, type ScheduleDecision } from "./schedule/backup-scheduler.js";
export { buildServices, type Services } from "./services.js";
export { BackupStorage } from "./storage/backup-storage.js";
export type { BackupTool, ToolResult } from "./tool/backup-tool.js";
export { XtraBackupTool } from "./tool/xtrabackup-tool.js";
export { BackupVerifier, parseCheckpoints } from "./verify/backup-verifier.js";
