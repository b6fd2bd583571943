import { logger } from "../config/logger.js";
import { InvalidTransitionError, isValidTransition } from "./entry-state-machine.js";
import { CatalogCorruptError, DuplicateIdError, EntryNotFoundError } from "./errors.js";
import type { IBackupMetadataRepository } from "./repository-types.js";
import {
  type BackupEntry,
  backupEntrySchema,
  compareEntries,
  type EntryState,
  type NewBackupEntry,
  type PreparationMarker,
  type PrepareMode,
} from "./types.js";

export interface MarkDetails {
  note?: string | null;
  preparedPath?: string | null;
  preparedMode?: PrepareMode | null;
}

/**
 * Index of every known backup entry, live or tombstoned.
 *
 * Holds nothing that is not also in the sidecar records, so a lost index
 * costs a rescan and never data. Callers serialize access through the
 * cluster lock; the catalog does no locking of its own.
 */
export class BackupCatalog {
  private readonly repo: IBackupMetadataRepository;
  private readonly clock: () => Date;
  private entries = new Map<string, BackupEntry>();

  constructor(opts: { repo: IBackupMetadataRepository; clock?: () => Date }) {
    this.repo = opts.repo;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Rebuild the index from storage-side metadata. */
  async load(): Promise<void> {
    const scanned = await this.repo.scan();
    const loaded = new Map<string, BackupEntry>();

    for (const item of scanned) {
      if (item.kind === "missing") {
        logger.warn(`Skipping ${item.dirName}: no metadata record (incomplete or foreign directory)`);
        continue;
      }
      if (item.kind === "unreadable") {
        throw new CatalogCorruptError(`metadata unreadable: ${item.error}`, item.dirName);
      }

      const parsed = backupEntrySchema.safeParse(item.raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new CatalogCorruptError(`metadata invalid (${issues})`, item.dirName);
      }

      const entry = parsed.data;
      if (entry.id !== item.dirName) {
        throw new CatalogCorruptError(`record id ${entry.id} does not match its directory`, item.dirName);
      }
      if (loaded.has(entry.id)) {
        throw new CatalogCorruptError("duplicate entry id", entry.id);
      }
      loaded.set(entry.id, entry);
    }

    for (const entry of loaded.values()) {
      checkConsistency(entry, loaded);
    }

    this.entries = loaded;
    logger.debug(`Catalog loaded: ${loaded.size} entries`);
  }

  /** Record a freshly taken backup as RAW. */
  async append(input: NewBackupEntry): Promise<BackupEntry> {
    if (this.entries.has(input.id)) {
      throw new DuplicateIdError(input.id);
    }

    const entry: BackupEntry = {
      id: input.id,
      type: input.type,
      createdAt: input.createdAt,
      baseId: input.baseId,
      state: "RAW",
      storagePath: input.storagePath,
      sizeBytes: input.sizeBytes,
      preparedPath: null,
      preparedMode: null,
      note: null,
      updatedAt: this.clock().toISOString(),
      preparation: null,
    };

    await this.repo.save(entry);
    this.entries.set(entry.id, entry);
    return entry;
  }

  /**
   * Move an entry to a new state. Re-marking an entry with the state it is
   * already in only refreshes the details.
   */
  async mark(id: string, state: EntryState, details: MarkDetails = {}): Promise<BackupEntry> {
    const current = this.require(id);
    if (current.state !== state && !isValidTransition(current.state, state)) {
      throw new InvalidTransitionError(id, current.state, state);
    }

    const next: BackupEntry = {
      ...current,
      state,
      note: details.note !== undefined ? details.note : current.note,
      preparedPath: details.preparedPath !== undefined ? details.preparedPath : current.preparedPath,
      preparedMode: details.preparedMode !== undefined ? details.preparedMode : current.preparedMode,
      updatedAt: this.clock().toISOString(),
    };

    if (state === "PRUNED") {
      next.storagePath = null;
      next.preparedPath = null;
      next.preparation = null;
    }

    await this.repo.save(next);
    this.entries.set(id, next);
    return next;
  }

  /** Set or clear the in-progress preparation marker on a chain anchor. */
  async setPreparationMarker(anchorId: string, marker: PreparationMarker | null): Promise<BackupEntry> {
    const current = this.require(anchorId);
    const next: BackupEntry = { ...current, preparation: marker, updatedAt: this.clock().toISOString() };
    await this.repo.save(next);
    this.entries.set(anchorId, next);
    return next;
  }

  get(id: string): BackupEntry | null {
    return this.entries.get(id) ?? null;
  }

  /** Every entry, tombstones included, oldest first. */
  list(): BackupEntry[] {
    return [...this.entries.values()].sort(compareEntries);
  }

  get size(): number {
    return this.entries.size;
  }

  private require(id: string): BackupEntry {
    const entry = this.entries.get(id);
    if (!entry) throw new EntryNotFoundError(id);
    return entry;
  }
}

function checkConsistency(entry: BackupEntry, all: Map<string, BackupEntry>): void {
  if (entry.type === "FULL" && entry.baseId !== null) {
    throw new CatalogCorruptError(`full backup names base ${entry.baseId}`, entry.id);
  }
  if (entry.type === "INCREMENTAL") {
    if (entry.baseId === null) {
      throw new CatalogCorruptError("incremental backup has no base", entry.id);
    }
    if (!all.has(entry.baseId)) {
      throw new CatalogCorruptError(`base ${entry.baseId} does not exist`, entry.id);
    }
  }
  if (entry.state !== "PRUNED" && entry.storagePath === null) {
    throw new CatalogCorruptError(`${entry.state} entry has no storage path`, entry.id);
  }
}
