import { cp, lstat, mkdir, readdir, rm, stat } from "node:fs/promises";
import { join, resolve, sep } from "node:path";
import { DuplicateIdError } from "../catalog/errors.js";
import { ENTRY_ID_RE } from "../catalog/types.js";
import { logger } from "../config/logger.js";

export const METADATA_FILE = "backup.json";
export const ARTIFACT_DIR = "data";
export const LOCK_FILE = ".cluster-backup.lock";

/**
 * On-disk layout of the backup root.
 *
 * ```
 * <root>/<id>/backup.json   sidecar metadata
 * <root>/<id>/data/         artifact written by the backup tool
 * <root>/.cluster-backup.lock
 * ```
 */
export class BackupStorage {
  readonly root: string;
  /** Where preparation copies live when artifacts must stay untouched. */
  readonly workDir: string | null;

  constructor(root: string, opts: { workDir?: string } = {}) {
    this.root = resolve(root);
    this.workDir = opts.workDir ? resolve(opts.workDir) : null;
  }

  entryDir(id: string): string {
    if (!ENTRY_ID_RE.test(id)) {
      throw new Error(`Invalid backup entry id: ${id}`);
    }
    return join(this.root, id);
  }

  artifactPath(id: string): string {
    return join(this.entryDir(id), ARTIFACT_DIR);
  }

  metadataPath(id: string): string {
    return join(this.entryDir(id), METADATA_FILE);
  }

  /** Working copy of `entryId` inside the preparation area of its chain. */
  workCopyPath(anchorId: string, entryId: string): string {
    if (!this.workDir) throw new Error("No preparation work directory configured");
    if (!ENTRY_ID_RE.test(anchorId) || !ENTRY_ID_RE.test(entryId)) {
      throw new Error(`Invalid backup entry id: ${anchorId}/${entryId}`);
    }
    return join(this.workDir, anchorId, entryId);
  }

  /** Drop every preparation copy made for a chain. No-op without a work directory. */
  async discardWorkCopies(anchorId: string): Promise<void> {
    if (!this.workDir) return;
    if (!ENTRY_ID_RE.test(anchorId)) throw new Error(`Invalid backup entry id: ${anchorId}`);
    await rm(join(this.workDir, anchorId), { recursive: true, force: true });
  }

  lockPath(): string {
    return join(this.root, LOCK_FILE);
  }

  /**
   * Reserve the directory for a new entry and return its artifact path.
   * The artifact directory itself is left for the backup tool to create.
   */
  async allocate(id: string): Promise<string> {
    await mkdir(this.root, { recursive: true });
    try {
      await mkdir(this.entryDir(id));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "EEXIST") throw new DuplicateIdError(id);
      throw err;
    }
    return this.artifactPath(id);
  }

  /** Remove a whole entry directory (used when a backup run fails). */
  async discard(id: string): Promise<void> {
    await rm(this.entryDir(id), { recursive: true, force: true });
  }

  /** Delete an artifact tree. Paths outside the root and work directory are refused. */
  async removeArtifact(path: string): Promise<void> {
    this.assertInside(path);
    await rm(path, { recursive: true, force: true });
    logger.debug(`Removed artifact ${path}`);
  }

  /** Replace `dest` with a recursive copy of `src`. */
  async copyArtifact(src: string, dest: string): Promise<void> {
    await rm(dest, { recursive: true, force: true });
    await mkdir(join(dest, ".."), { recursive: true });
    await cp(src, dest, { recursive: true });
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
      throw err;
    }
  }

  /** Total size in bytes of every regular file below `path`. */
  async sizeOf(path: string): Promise<number> {
    const info = await lstat(path);
    if (!info.isDirectory()) return info.isFile() ? info.size : 0;

    let total = 0;
    for (const child of await readdir(path)) {
      total += await this.sizeOf(join(path, child));
    }
    return total;
  }

  private assertInside(path: string): void {
    const abs = resolve(path);
    const roots = this.workDir ? [this.root, this.workDir] : [this.root];
    if (!roots.some((root) => abs !== root && abs.startsWith(root + sep))) {
      throw new Error(`Refusing to remove ${abs}: not inside ${roots.join(" or ")}`);
    }
  }
}
