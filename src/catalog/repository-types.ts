// src/catalog/repository-types.ts
//
// Storage contract for backup entry metadata. The catalog works against
// this interface only; it never touches the filesystem itself.

import type { BackupEntry } from "./types.js";

/** One directory found while scanning the backup root. */
export type ScannedMetadata =
  | { kind: "record"; dirName: string; raw: unknown }
  | { kind: "missing"; dirName: string }
  | { kind: "unreadable"; dirName: string; error: string };

export interface IBackupMetadataRepository {
  /** Every entry directory under the backup root, in directory-name order. */
  scan(): Promise<ScannedMetadata[]>;
  /** Create or replace the metadata record for an entry. */
  save(entry: BackupEntry): Promise<void>;
}
