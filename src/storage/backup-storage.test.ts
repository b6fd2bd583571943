import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DuplicateIdError } from "../catalog/errors.js";
import { makeTempDir } from "../test/fixtures.js";
import { BackupStorage } from "./backup-storage.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

const ID = "20260309T020000Z-full";

describe("BackupStorage", () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let storage: BackupStorage;

  beforeEach(async () => {
    ({ dir: root, cleanup } = await makeTempDir("storage"));
    storage = new BackupStorage(root, { workDir: join(root, ".work") });
  });

  afterEach(async () => {
    await cleanup();
  });

  it("lays entries out under the root", () => {
    expect(storage.entryDir(ID)).toBe(join(root, ID));
    expect(storage.artifactPath(ID)).toBe(join(root, ID, "data"));
    expect(storage.metadataPath(ID)).toBe(join(root, ID, "backup.json"));
    expect(storage.lockPath()).toBe(join(root, ".cluster-backup.lock"));
    expect(storage.workCopyPath(ID, "20260310T020000Z-incr")).toBe(join(root, ".work", ID, "20260310T020000Z-incr"));
  });

  it("rejects ids that could escape the root", () => {
    expect(() => storage.entryDir("../etc")).toThrow("Invalid backup entry id: ../etc");
    expect(() => storage.workCopyPath(ID, "..")).toThrow("Invalid backup entry id");
  });

  it("has no work copies without a work directory", () => {
    expect(() => new BackupStorage(root).workCopyPath(ID, ID)).toThrow("No preparation work directory configured");
  });

  it("allocates an entry directory once", async () => {
    expect(await storage.allocate(ID)).toBe(join(root, ID, "data"));
    expect(await storage.exists(join(root, ID))).toBe(true);
    await expect(storage.allocate(ID)).rejects.toBeInstanceOf(DuplicateIdError);
  });

  it("discards a whole entry directory", async () => {
    await storage.allocate(ID);
    await storage.discard(ID);
    expect(await storage.exists(join(root, ID))).toBe(false);
  });

  it("removes artifacts inside the root or work directory", async () => {
    const artifact = join(root, ID, "data");
    const copy = storage.workCopyPath(ID, ID);
    await mkdir(artifact, { recursive: true });
    await mkdir(copy, { recursive: true });

    await storage.removeArtifact(artifact);
    await storage.removeArtifact(copy);

    expect(await storage.exists(artifact)).toBe(false);
    expect(await storage.exists(copy)).toBe(false);
    expect(await storage.exists(join(root, ID))).toBe(true);
  });

  it("refuses to remove anything outside its directories", async () => {
    await expect(storage.removeArtifact("/var/lib/mysql")).rejects.toThrow(
      `Refusing to remove /var/lib/mysql: not inside ${root} or ${join(root, ".work")}`,
    );
    await expect(storage.removeArtifact(root)).rejects.toThrow("Refusing to remove");
  });

  it("copies an artifact over a previous copy", async () => {
    const src = join(root, ID, "data");
    await mkdir(join(src, "sub"), { recursive: true });
    await writeFile(join(src, "sub", "ibdata1"), "pages");
    const dest = storage.workCopyPath(ID, ID);
    await mkdir(dest, { recursive: true });
    await writeFile(join(dest, "stale"), "old");

    await storage.copyArtifact(src, dest);

    expect(await readFile(join(dest, "sub", "ibdata1"), "utf-8")).toBe("pages");
    expect(await storage.exists(join(dest, "stale"))).toBe(false);
  });

  it("sums the size of every file below a path", async () => {
    const dir = join(root, ID, "data");
    await mkdir(join(dir, "nested"), { recursive: true });
    await writeFile(join(dir, "a"), "12345");
    await writeFile(join(dir, "nested", "b"), "123");

    expect(await storage.sizeOf(dir)).toBe(8);
  });

  it("drops a chain's work copies", async () => {
    await mkdir(storage.workCopyPath(ID, ID), { recursive: true });
    await storage.discardWorkCopies(ID);
    expect(await storage.exists(join(root, ".work", ID))).toBe(false);
  });
});
