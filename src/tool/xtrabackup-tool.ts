import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "../config/logger.js";
import type {
  BackupTool,
  PrepareStepRequest,
  RestoreRequest,
  TakeBackupRequest,
  ToolResult,
} from "./backup-tool.js";

const execFileAsync = promisify(execFile);

/** xtrabackup writes its whole progress log to stderr. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const STDERR_TAIL_LINES = 20;

const EXIT_TIMED_OUT = 124;
const EXIT_NOT_RUNNABLE = 127;
/** 128 + SIGINT, as a shell reports an interrupted command. */
const EXIT_CANCELLED = 130;

export interface XtraBackupToolOptions {
  /** Path to the xtrabackup binary. */
  binary: string;
  /** Passed as --defaults-file; must be the first argument when present. */
  defaultsFile?: string;
  compress: boolean;
  parallel: number;
  timeoutMs: number;
  /** Measures the artifact after a backup completes. */
  sizeOf: (path: string) => Promise<number>;
  /** Aborting kills the running xtrabackup process; the step then reports exit 130. */
  signal?: AbortSignal;
}

/**
 * Percona XtraBackup driver.
 *
 * Every invocation uses execFile with an explicit argument array, so paths
 * are never interpreted by a shell.
 */
export class XtraBackupTool implements BackupTool {
  private readonly opts: XtraBackupToolOptions;

  constructor(opts: XtraBackupToolOptions) {
    this.opts = opts;
  }

  async takeBackup(req: TakeBackupRequest): Promise<ToolResult & { sizeBytes: number }> {
    const args = ["--backup", "--galera-info", `--target-dir=${req.targetPath}`, `--parallel=${this.opts.parallel}`];
    if (this.opts.compress) args.push("--compress");
    if (req.type === "INCREMENTAL") {
      if (!req.basePath) throw new Error("Incremental backup requires a base artifact path");
      args.push(`--incremental-basedir=${req.basePath}`);
    }

    const result = await this.run("backup", args);
    const sizeBytes = result.exitCode === 0 ? await this.opts.sizeOf(req.targetPath) : 0;
    return { ...result, sizeBytes };
  }

  async prepareStep(req: PrepareStepRequest): Promise<ToolResult> {
    if (this.opts.compress) {
      const compressedDir = req.incrementalPath ?? req.targetPath;
      const decompressed = await this.run("decompress", [
        "--decompress",
        "--remove-original",
        `--parallel=${this.opts.parallel}`,
        `--target-dir=${compressedDir}`,
      ]);
      if (decompressed.exitCode !== 0) return decompressed;
    }

    const args = ["--prepare", `--target-dir=${req.targetPath}`];
    if (req.mode === "REDO_ONLY") args.push("--apply-log-only");
    if (req.incrementalPath) args.push(`--incremental-dir=${req.incrementalPath}`);
    return this.run("prepare", args);
  }

  async restore(req: RestoreRequest): Promise<ToolResult> {
    return this.run("copy-back", [
      "--copy-back",
      `--target-dir=${req.sourcePath}`,
      `--datadir=${req.dataDir}`,
      `--parallel=${this.opts.parallel}`,
    ]);
  }

  /** Build the final argument list (exported for tests). */
  argsFor(args: string[]): string[] {
    return this.opts.defaultsFile ? [`--defaults-file=${this.opts.defaultsFile}`, ...args] : args;
  }

  private async run(step: string, args: string[]): Promise<ToolResult> {
    const fullArgs = this.argsFor(args);
    logger.info(`xtrabackup ${step}`, { args: fullArgs });

    try {
      const { stderr } = await execFileAsync(this.opts.binary, fullArgs, {
        timeout: this.opts.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        signal: this.opts.signal,
      });
      logger.debug(`xtrabackup ${step} completed`, { stderr: tail(stderr) });
      return { exitCode: 0, stderr };
    } catch (err) {
      const exitCode = exitCodeOf(err);
      const stderr = stderrOf(err);
      logger.error(`xtrabackup ${step} failed with exit code ${exitCode}`, {
        err: err instanceof Error ? err.message : String(err),
        stderr: tail(stderr),
      });
      return { exitCode, stderr };
    }
  }
}

/**
 * Map an execFile rejection to an exit status: the process exit code when
 * there is one, 130 when it was cancelled, 124 when the deadline killed it,
 * 127 when it never started.
 */
export function exitCodeOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return EXIT_NOT_RUNNABLE;
  if ("name" in err && err.name === "AbortError") return EXIT_CANCELLED;
  if ("code" in err && typeof err.code === "number" && err.code !== 0) return err.code;
  if ("killed" in err && err.killed === true) return EXIT_TIMED_OUT;
  return EXIT_NOT_RUNNABLE;
}

function stderrOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string") {
    return err.stderr;
  }
  return err instanceof Error ? err.message : String(err);
}

function tail(text: string): string {
  return text.trimEnd().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
}
