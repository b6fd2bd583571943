import type { BackupType, PrepareMode } from "../catalog/types.js";

/** Outcome of one external tool invocation. A non-zero exit code is failure. */
export interface ToolResult {
  exitCode: number;
  stderr: string;
}

export interface TakeBackupRequest {
  /** Directory the tool writes the new artifact into. */
  targetPath: string;
  type: BackupType;
  /** Artifact the delta is taken against; null for FULL. */
  basePath: string | null;
}

export interface PrepareStepRequest {
  /** Accumulating restorable result (the anchor's artifact or its copy). */
  targetPath: string;
  mode: PrepareMode;
  /** Delta applied onto `targetPath`; null when preparing the anchor itself. */
  incrementalPath: string | null;
}

export interface RestoreRequest {
  /** Prepared artifact to copy back. */
  sourcePath: string;
  /** MySQL data directory to restore into. */
  dataDir: string;
}

/** The physical backup tool, treated as a black box. */
export interface BackupTool {
  takeBackup(req: TakeBackupRequest): Promise<ToolResult & { sizeBytes: number }>;
  prepareStep(req: PrepareStepRequest): Promise<ToolResult>;
  restore(req: RestoreRequest): Promise<ToolResult>;
}
