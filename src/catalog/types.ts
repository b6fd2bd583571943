import { z } from "zod";

export const BACKUP_TYPES = ["FULL", "INCREMENTAL"] as const;
export type BackupType = (typeof BACKUP_TYPES)[number];

export const ENTRY_STATES = ["RAW", "PREPARED", "CORRUPT", "PRUNED"] as const;
export type EntryState = (typeof ENTRY_STATES)[number];

export const PREPARE_MODES = ["REDO_ONLY", "REDO_UNDO"] as const;
export type PrepareMode = (typeof PREPARE_MODES)[number];

/** Left on a chain's anchor while a preparation run is working through it. */
export const preparationMarkerSchema = z.object({
  startedAt: z.string().datetime(),
  entryId: z.string().min(1),
});
export type PreparationMarker = z.infer<typeof preparationMarkerSchema>;

/**
 * Sidecar metadata record (`<root>/<id>/backup.json`).
 *
 * Unknown keys are stripped on read so records written by newer releases
 * still load.
 */
export const backupEntrySchema = z.object({
  id: z.string().min(1),
  type: z.enum(BACKUP_TYPES),
  createdAt: z.string().datetime(),
  baseId: z.string().min(1).nullable(),
  state: z.enum(ENTRY_STATES),
  storagePath: z.string().min(1).nullable(),
  sizeBytes: z.number().int().min(0).default(0),
  preparedPath: z.string().min(1).nullable().default(null),
  preparedMode: z.enum(PREPARE_MODES).nullable().default(null),
  note: z.string().nullable().default(null),
  updatedAt: z.string().datetime().nullable().default(null),
  preparation: preparationMarkerSchema.nullable().default(null),
});

export type BackupEntry = z.infer<typeof backupEntrySchema>;

/** Fields a caller supplies when recording a freshly taken backup. */
export interface NewBackupEntry {
  id: string;
  type: BackupType;
  createdAt: string;
  baseId: string | null;
  storagePath: string;
  sizeBytes: number;
}

const ID_SUFFIX: Record<BackupType, string> = { FULL: "full", INCREMENTAL: "incr" };

/** Entry ids look like `20261019T030000Z-full`; they sort in creation order. */
export const ENTRY_ID_RE = /^\d{8}T\d{6}Z-(full|incr)$/;

export function entryIdFor(createdAt: Date, type: BackupType): string {
  const stamp = createdAt.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return `${stamp}-${ID_SUFFIX[type]}`;
}

/** Order by creation time, then by id. */
export function compareEntries(a: BackupEntry, b: BackupEntry): number {
  const byTime = Date.parse(a.createdAt) - Date.parse(b.createdAt);
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
