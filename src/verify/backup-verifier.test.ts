import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackupCatalog } from "../catalog/backup-catalog.js";
import { InMemoryBackupMetadataRepository } from "../catalog/in-memory-metadata-repository.js";
import type { BackupEntry } from "../catalog/types.js";
import { chainsOf } from "../chain/chain-resolver.js";
import { full, incr, makeTempDir } from "../test/fixtures.js";
import { BackupVerifier, CHECKPOINTS_FILE, parseCheckpoints } from "./backup-verifier.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

const NOW = new Date("2026-03-11T05:00:00Z");

describe("parseCheckpoints", () => {
  it("reads the type and LSN range", () => {
    const text = "backup_type = incremental\nfrom_lsn = 18446744073709551615\nto_lsn = 18446744073709551700\n";
    expect(parseCheckpoints(text)).toEqual({
      backupType: "incremental",
      fromLsn: "18446744073709551615",
      toLsn: "18446744073709551700",
    });
  });

  it("rejects files without the required fields", () => {
    expect(() => parseCheckpoints("from_lsn = 0\nto_lsn = 5\n")).toThrow("xtrabackup_checkpoints has no backup_type");
    expect(() => parseCheckpoints("backup_type = full-backuped\nfrom_lsn = 0\nto_lsn = abc\n")).toThrow(
      "xtrabackup_checkpoints has no valid to_lsn",
    );
  });
});

describe("BackupVerifier", () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let f1: BackupEntry;
  let i1: BackupEntry;
  let i2: BackupEntry;

  beforeEach(async () => {
    ({ dir: root, cleanup } = await makeTempDir("verify"));
    f1 = located(full("2026-03-09T02:00:00Z"));
    i1 = located(incr("2026-03-10T02:00:00Z", f1));
    i2 = located(incr("2026-03-11T02:00:00Z", i1));
  });

  afterEach(async () => {
    await cleanup();
  });

  function located(entry: BackupEntry): BackupEntry {
    return { ...entry, storagePath: join(root, entry.id, "data") };
  }

  async function writeCheckpoints(entry: BackupEntry, backupType: string, from: number, to: number): Promise<void> {
    const dir = join(root, entry.id, "data");
    await mkdir(dir, { recursive: true });
    await writeFile(
      join(dir, CHECKPOINTS_FILE),
      `backup_type = ${backupType}\nfrom_lsn = ${from}\nto_lsn = ${to}\nlast_lsn = ${to}\n`,
    );
  }

  async function setup(entries: BackupEntry[]) {
    const catalog = new BackupCatalog({ repo: new InMemoryBackupMetadataRepository(entries), clock: () => NOW });
    await catalog.load();
    const verifier = new BackupVerifier({ catalog, clock: () => NOW });
    return { catalog, verifier, chains: chainsOf(catalog.list()) };
  }

  it("passes a chain whose deltas line up", async () => {
    await writeCheckpoints(f1, "full-backuped", 0, 100);
    await writeCheckpoints(i1, "incremental", 100, 200);
    await writeCheckpoints(i2, "incremental", 200, 300);
    const { catalog, verifier, chains } = await setup([f1, i1, i2]);

    const report = await verifier.verify(chains);

    expect(report).toEqual({
      verifiedAt: NOW.toISOString(),
      totalChecked: 3,
      passed: 3,
      failed: 0,
      results: [
        { entryId: f1.id, valid: true },
        { entryId: i1.id, valid: true },
        { entryId: i2.id, valid: true },
      ],
    });
    expect(catalog.list().map((e) => e.state)).toEqual(["RAW", "RAW", "RAW"]);
  });

  it("fails a missing artifact and everything built on it", async () => {
    await writeCheckpoints(f1, "full-backuped", 0, 100);
    await writeCheckpoints(i2, "incremental", 200, 300);
    const { catalog, verifier, chains } = await setup([f1, i1, i2]);

    const report = await verifier.verify(chains);

    const missing = `artifact ${i1.storagePath} is missing`;
    expect(report.failed).toBe(2);
    expect(report.results.slice(1)).toEqual([
      { entryId: i1.id, valid: false, error: missing },
      { entryId: i2.id, valid: false, error: `built on ${i1.id}, which failed verification` },
    ]);
    expect(catalog.get(i1.id)).toMatchObject({ state: "CORRUPT", note: `verification failed: ${missing}` });
    expect(catalog.get(i2.id)?.state).toBe("CORRUPT");
    expect(catalog.get(f1.id)?.state).toBe("RAW");
  });

  it("fails an artifact without a checkpoints file", async () => {
    await mkdir(join(root, f1.id, "data"), { recursive: true });
    const { verifier, chains } = await setup([f1]);

    const report = await verifier.verify(chains);

    expect(report.results).toEqual([{ entryId: f1.id, valid: false, error: "xtrabackup_checkpoints is missing" }]);
  });

  it("fails a delta that does not continue its predecessor", async () => {
    await writeCheckpoints(f1, "full-backuped", 0, 100);
    await writeCheckpoints(i1, "incremental", 100, 200);
    await writeCheckpoints(i2, "incremental", 250, 300);
    const { verifier, chains } = await setup([f1, i1, i2]);

    const report = await verifier.verify(chains);

    expect(report.results[2]).toEqual({
      entryId: i2.id,
      valid: false,
      error: `from_lsn 250 does not continue ${i1.id} (to_lsn 200)`,
    });
  });

  it("fails an artifact of the wrong type", async () => {
    await writeCheckpoints(f1, "incremental", 0, 100);
    const { verifier, chains } = await setup([f1]);

    const report = await verifier.verify(chains);

    expect(report.results[0].error).toBe("backup_type incremental does not match a FULL backup");
  });

  it("skips the LSN check once an entry has been prepared", async () => {
    const anchor: BackupEntry = { ...f1, state: "PREPARED", preparedPath: f1.storagePath, preparedMode: "REDO_ONLY" };
    await writeCheckpoints(anchor, "log-applied", 0, 180);
    await writeCheckpoints(i1, "incremental", 100, 200);
    const { verifier, chains } = await setup([anchor, i1]);

    const report = await verifier.verify(chains);

    expect(report.failed).toBe(0);
  });

  it("ignores pruned entries and leaves corrupt ones as they are", async () => {
    const gone: BackupEntry = { ...f1, state: "PRUNED", storagePath: null };
    const broken = located(
      full("2026-03-02T02:00:00Z", { state: "CORRUPT", note: "redo-only step exited with code 1" }),
    );
    const { catalog, verifier, chains } = await setup([broken, gone]);
    const mark = vi.spyOn(catalog, "mark");

    const report = await verifier.verify(chains);

    expect(report.totalChecked).toBe(1);
    expect(report.results[0].entryId).toBe(broken.id);
    expect(mark).not.toHaveBeenCalled();
    expect(catalog.get(broken.id)?.note).toBe("redo-only step exited with code 1");
  });
});
