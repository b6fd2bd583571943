import type { Dirent } from "node:fs";
import { readdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { BackupStorage, METADATA_FILE } from "../storage/backup-storage.js";
import type { IBackupMetadataRepository, ScannedMetadata } from "./repository-types.js";
import type { BackupEntry } from "./types.js";

/** Sidecar-file metadata: one `backup.json` beside each artifact. */
export class FsBackupMetadataRepository implements IBackupMetadataRepository {
  constructor(private readonly storage: BackupStorage) {}

  async scan(): Promise<ScannedMetadata[]> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(this.storage.root, { withFileTypes: true });
    } catch (err) {
      // A root that does not exist yet simply has no backups.
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const dirNames = dirents
      .filter((d) => d.isDirectory() && !d.name.startsWith("."))
      .map((d) => d.name)
      .sort();

    const results: ScannedMetadata[] = [];
    for (const dirName of dirNames) {
      results.push(await this.readSidecar(dirName));
    }
    return results;
  }

  async save(entry: BackupEntry): Promise<void> {
    const target = this.storage.metadataPath(entry.id);
    const tmp = `${target}.tmp`;
    await writeFile(tmp, `${JSON.stringify(entry, null, 2)}\n`, "utf-8");
    await rename(tmp, target);
  }

  private async readSidecar(dirName: string): Promise<ScannedMetadata> {
    const path = join(this.storage.root, dirName, METADATA_FILE);
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return { kind: "missing", dirName };
      return { kind: "unreadable", dirName, error: err instanceof Error ? err.message : String(err) };
    }

    try {
      return { kind: "record", dirName, raw: JSON.parse(text) };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { kind: "unreadable", dirName, error: `invalid JSON (${reason})` };
    }
  }
}
