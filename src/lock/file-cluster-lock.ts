import { randomUUID } from "node:crypto";
import { mkdir, readFile, stat, unlink, utimes, writeFile } from "node:fs/promises";
import { hostname } from "node:os";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { type ClusterLock, type LockToken, LockTimeoutError } from "./cluster-lock.js";

const lockHolderSchema = z.object({
  token: z.string(),
  host: z.string(),
  pid: z.number(),
  acquiredAt: z.string(),
});
type LockHolder = z.infer<typeof lockHolderSchema>;

export interface FileClusterLockOptions {
  /** Lock file on storage every cluster node shares (the backup root). */
  path: string;
  pollIntervalMs?: number;
  /** Break a lock file not refreshed for this long. Never broken when unset. */
  staleAfterMs?: number;
  /** How often a holder refreshes the file's mtime. Defaults to a third of `staleAfterMs`, else one minute. */
  heartbeatIntervalMs?: number;
  /** Aborting stops a pending `acquire`. */
  signal?: AbortSignal;
}

/**
 * Advisory lock implemented as an exclusively created file.
 *
 * The file records who holds the lock; release only removes a file that
 * still carries this holder's token. While held, the file's mtime is
 * refreshed on a heartbeat, so only a holder that died stops looking fresh.
 */
export class FileClusterLock implements ClusterLock {
  private readonly path: string;
  private readonly pollIntervalMs: number;
  private readonly staleAfterMs?: number;
  private readonly heartbeatIntervalMs: number;
  private readonly signal?: AbortSignal;
  private readonly heartbeats = new Map<string, NodeJS.Timeout>();

  constructor(opts: FileClusterLockOptions) {
    this.path = opts.path;
    this.pollIntervalMs = opts.pollIntervalMs ?? 1_000;
    this.staleAfterMs = opts.staleAfterMs;
    this.heartbeatIntervalMs =
      opts.heartbeatIntervalMs ?? (opts.staleAfterMs === undefined ? 60_000 : Math.ceil(opts.staleAfterMs / 3));
    this.signal = opts.signal;
  }

  async acquire(timeoutMs: number): Promise<LockToken> {
    await mkdir(dirname(this.path), { recursive: true });
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const holder: LockHolder = {
        token: randomUUID(),
        host: hostname(),
        pid: process.pid,
        acquiredAt: new Date().toISOString(),
      };

      try {
        await writeFile(this.path, JSON.stringify(holder), { flag: "wx" });
        logger.debug(`Cluster lock acquired: ${this.path}`, { token: holder.token });
        this.startHeartbeat(holder.token);
        return { id: holder.token, acquiredAt: holder.acquiredAt };
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
      }

      if (await this.breakIfStale()) continue;

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        const current = await this.readHolder();
        throw new LockTimeoutError(timeoutMs, current ? `${current.host} pid ${current.pid}` : null);
      }
      await sleep(Math.min(this.pollIntervalMs, remaining), undefined, { signal: this.signal });
    }
  }

  async release(token: LockToken): Promise<void> {
    this.stopHeartbeat(token.id);
    const current = await this.readHolder();
    if (!current) {
      logger.warn(`Cluster lock ${this.path} vanished before release`, { token: token.id });
      return;
    }
    if (current.token !== token.id) {
      logger.warn(`Cluster lock ${this.path} is now held by ${current.host} pid ${current.pid}; not removing it`, {
        token: token.id,
      });
      return;
    }
    await unlink(this.path);
    logger.debug(`Cluster lock released: ${this.path}`, { token: token.id });
  }

  private startHeartbeat(token: string): void {
    const timer = setInterval(() => {
      this.touch(token).catch((err: unknown) => {
        logger.warn(`Could not refresh cluster lock ${this.path}`, {
          err: err instanceof Error ? err.message : String(err),
        });
      });
    }, this.heartbeatIntervalMs);
    // A forgotten release must not keep the process alive.
    timer.unref();
    this.heartbeats.set(token, timer);
  }

  private stopHeartbeat(token: string): void {
    const timer = this.heartbeats.get(token);
    if (timer === undefined) return;
    clearInterval(timer);
    this.heartbeats.delete(token);
  }

  /** Refresh the mtime while the file is still ours; stop beating once it is not. */
  private async touch(token: string): Promise<void> {
    const current = await this.readHolder();
    if (current?.token !== token) {
      logger.warn(`Cluster lock ${this.path} is no longer held by this process`, { token });
      this.stopHeartbeat(token);
      return;
    }
    const now = new Date();
    await utimes(this.path, now, now);
  }

  private async breakIfStale(): Promise<boolean> {
    if (this.staleAfterMs === undefined) return false;

    let ageMs: number;
    try {
      ageMs = Date.now() - (await stat(this.path)).mtimeMs;
    } catch (err) {
      // Released between our create attempt and the stat: just retry.
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return true;
      throw err;
    }
    if (ageMs < this.staleAfterMs) return false;

    const holder = await this.readHolder();
    logger.warn(`Breaking stale cluster lock ${this.path} (age ${Math.round(ageMs / 1000)}s)`, { holder });
    try {
      await unlink(this.path);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
    return true;
  }

  private async readHolder(): Promise<LockHolder | null> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
    try {
      const parsed = lockHolderSchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data : null;
    } catch {
      // Partially written by a holder that is still creating it.
      return null;
    }
  }
}
