import { beforeEach, describe, expect, it, vi } from "vitest";
import { full, incr } from "../test/fixtures.js";
import { BackupCatalog } from "./backup-catalog.js";
import { InvalidTransitionError } from "./entry-state-machine.js";
import { CatalogCorruptError, DuplicateIdError, EntryNotFoundError } from "./errors.js";
import { InMemoryBackupMetadataRepository } from "./in-memory-metadata-repository.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

const NOW = new Date("2026-03-11T02:00:00Z");

describe("BackupCatalog", () => {
  const f1 = full("2026-03-09T02:00:00Z");
  const i1 = incr("2026-03-10T02:00:00Z", f1);

  let repo: InMemoryBackupMetadataRepository;
  let catalog: BackupCatalog;

  beforeEach(async () => {
    repo = new InMemoryBackupMetadataRepository([i1, f1]);
    catalog = new BackupCatalog({ repo, clock: () => NOW });
    await catalog.load();
  });

  describe("load", () => {
    it("indexes every record and lists them oldest first", () => {
      expect(catalog.size).toBe(2);
      expect(catalog.list().map((e) => e.id)).toEqual([f1.id, i1.id]);
    });

    it("skips directories without a metadata record", async () => {
      repo.seed({ kind: "missing", dirName: "20260311T020000Z-full" });
      await catalog.load();
      expect(catalog.size).toBe(2);
    });

    it("rejects a record that fails validation", async () => {
      repo.seed({ kind: "record", dirName: "20260311T020000Z-full", raw: { id: "20260311T020000Z-full" } });
      await expect(catalog.load()).rejects.toBeInstanceOf(CatalogCorruptError);
    });

    it("rejects an unreadable record", async () => {
      repo.seed({ kind: "unreadable", dirName: "20260311T020000Z-full", error: "invalid JSON" });
      await expect(catalog.load()).rejects.toThrow(
        "Catalog corrupt at 20260311T020000Z-full: metadata unreadable: invalid JSON",
      );
    });

    it("rejects a record whose id does not match its directory", async () => {
      const f2 = full("2026-03-11T02:00:00Z");
      repo.seed({ kind: "record", dirName: "20260312T020000Z-full", raw: f2 });
      await expect(catalog.load()).rejects.toThrow(
        `Catalog corrupt at 20260312T020000Z-full: record id ${f2.id} does not match its directory`,
      );
    });

    it("rejects an incremental whose base is unknown", async () => {
      const stray = incr("2026-03-11T02:00:00Z", full("2026-03-01T02:00:00Z"));
      repo.seed({ kind: "record", dirName: stray.id, raw: stray });
      await expect(catalog.load()).rejects.toThrow(`base 20260301T020000Z-full does not exist`);
    });

    it("keeps the previous index when a reload fails", async () => {
      repo.seed({ kind: "unreadable", dirName: "20260311T020000Z-full", error: "EIO" });
      await expect(catalog.load()).rejects.toBeInstanceOf(CatalogCorruptError);
      expect(catalog.size).toBe(2);
    });

    it("drops fields it does not know", async () => {
      const f2 = full("2026-03-11T02:00:00Z");
      repo.seed({ kind: "record", dirName: f2.id, raw: { ...f2, checksum: "abc" } });
      await catalog.load();
      expect(catalog.get(f2.id)).toEqual(f2);
    });
  });

  describe("append", () => {
    it("records a new RAW entry and persists it", async () => {
      const entry = await catalog.append({
        id: "20260311T020000Z-incr",
        type: "INCREMENTAL",
        createdAt: NOW.toISOString(),
        baseId: f1.id,
        storagePath: "/backups/20260311T020000Z-incr/data",
        sizeBytes: 2048,
      });

      expect(entry.state).toBe("RAW");
      expect(entry.updatedAt).toBe(NOW.toISOString());
      expect(repo.saves).toBe(1);
      expect(repo.peek(entry.id)).toEqual(entry);
      expect(catalog.get(entry.id)).toEqual(entry);
    });

    it("refuses an id that is already present", async () => {
      await expect(
        catalog.append({
          id: f1.id,
          type: "FULL",
          createdAt: f1.createdAt,
          baseId: null,
          storagePath: "/elsewhere",
          sizeBytes: 1,
        }),
      ).rejects.toBeInstanceOf(DuplicateIdError);
      expect(repo.saves).toBe(0);
    });
  });

  describe("mark", () => {
    it("moves an entry along a valid transition with its details", async () => {
      const next = await catalog.mark(f1.id, "PREPARED", { preparedPath: f1.storagePath, preparedMode: "REDO_ONLY" });
      expect(next.state).toBe("PREPARED");
      expect(next.preparedPath).toBe(f1.storagePath);
      expect(next.preparedMode).toBe("REDO_ONLY");
      expect(repo.saves).toBe(1);
    });

    it("refuses an invalid transition without writing", async () => {
      await catalog.mark(f1.id, "PRUNED");
      await expect(catalog.mark(f1.id, "PREPARED")).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(repo.saves).toBe(1);
      expect(catalog.get(f1.id)?.state).toBe("PRUNED");
    });

    it("refreshes details when the state does not change", async () => {
      await catalog.mark(i1.id, "CORRUPT", { note: "first" });
      const again = await catalog.mark(i1.id, "CORRUPT", { note: "second" });
      expect(again.note).toBe("second");
    });

    it("clears paths and the preparation marker on prune", async () => {
      await catalog.setPreparationMarker(f1.id, { startedAt: NOW.toISOString(), entryId: f1.id });
      await catalog.mark(f1.id, "PREPARED", { preparedPath: f1.storagePath, preparedMode: "REDO_UNDO" });
      const pruned = await catalog.mark(f1.id, "PRUNED", { note: "rotated" });

      expect(pruned.storagePath).toBeNull();
      expect(pruned.preparedPath).toBeNull();
      expect(pruned.preparation).toBeNull();
      expect(pruned.note).toBe("rotated");
    });

    it("throws for an unknown id", async () => {
      await expect(catalog.mark("20200101T000000Z-full", "PRUNED")).rejects.toBeInstanceOf(EntryNotFoundError);
    });
  });

  describe("setPreparationMarker", () => {
    it("sets and clears the marker on the anchor", async () => {
      const marker = { startedAt: NOW.toISOString(), entryId: i1.id };
      expect((await catalog.setPreparationMarker(f1.id, marker)).preparation).toEqual(marker);
      expect((await catalog.setPreparationMarker(f1.id, null)).preparation).toBeNull();
      expect(repo.saves).toBe(2);
    });
  });
});
