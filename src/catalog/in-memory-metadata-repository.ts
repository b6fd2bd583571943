import type { IBackupMetadataRepository, ScannedMetadata } from "./repository-types.js";
import type { BackupEntry } from "./types.js";

/** Map-backed metadata store for tests and dry runs. */
export class InMemoryBackupMetadataRepository implements IBackupMetadataRepository {
  private readonly records = new Map<string, ScannedMetadata>();
  /** Number of save() calls, so tests can assert that nothing was written. */
  saves = 0;

  constructor(entries: BackupEntry[] = []) {
    for (const entry of entries) {
      this.records.set(entry.id, { kind: "record", dirName: entry.id, raw: structuredClone(entry) });
    }
  }

  async scan(): Promise<ScannedMetadata[]> {
    return [...this.records.values()]
      .sort((a, b) => a.dirName.localeCompare(b.dirName))
      .map((r) => (r.kind === "record" ? { ...r, raw: structuredClone(r.raw) } : r));
  }

  async save(entry: BackupEntry): Promise<void> {
    this.saves++;
    this.records.set(entry.id, { kind: "record", dirName: entry.id, raw: structuredClone(entry) });
  }

  /** Place an arbitrary scan result, e.g. a malformed or missing sidecar. */
  seed(scanned: ScannedMetadata): void {
    this.records.set(scanned.dirName, scanned);
  }

  /** The last saved record for an id, if it was a well-formed entry. */
  peek(id: string): unknown {
    const record = this.records.get(id);
    return record?.kind === "record" ? structuredClone(record.raw) : undefined;
  }
}
