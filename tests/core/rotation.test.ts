import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, utimes } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  finalizeBackup,
  listBackupDirs,
  readLatestPointer,
  rotateBackups,
  writeLatestPointer,
} from "../../src/core/cleanup/rotation";

describe("rotation", () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    root = await mkdtemp(path.join(os.tmpdir(), "homestash-rotation-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  /** Backup directory with a modification time `minutes` after a fixed epoch */
  async function backupAt(name: string, minutes: number): Promise<string> {
    const dir = path.join(root, name);
    await mkdir(dir);
    const time = new Date(Date.UTC(2026, 0, 1) + minutes * 60 * 1000);
    await utimes(dir, time, time);
    return dir;
  }

  describe("listBackupDirs", () => {
    test("orders by modification time, newest first", async () => {
      await backupAt("2026-01-01_000000", 30);
      await backupAt("2026-01-02_000000", 10);
      await backupAt("2026-01-03_000000", 20);

      expect((await listBackupDirs(root)).map((b) => b.backupId)).toEqual([
        "2026-01-01_000000",
        "2026-01-03_000000",
        "2026-01-02_000000",
      ]);
    });

    test("breaks ties by name", async () => {
      await backupAt("2026-01-01_000000", 5);
      await backupAt("2026-01-01_000000-2", 5);

      expect((await listBackupDirs(root)).map((b) => b.backupId)).toEqual([
        "2026-01-01_000000-2",
        "2026-01-01_000000",
      ]);
    });

    test("orders same-second runs by their counter, not as text", async () => {
      await backupAt("2026-01-01_000000-9", 5);
      await backupAt("2026-01-01_000000-10", 5);
      await backupAt("2025-12-31_235959-11", 5);

      expect((await listBackupDirs(root)).map((b) => b.backupId)).toEqual([
        "2026-01-01_000000-10",
        "2026-01-01_000000-9",
        "2025-12-31_235959-11",
      ]);
    });

    test("rotation drops the lower counter of a same-second tie", async () => {
      await backupAt("2026-01-01_000000-9", 5);
      const newer = await backupAt("2026-01-01_000000-10", 5);

      const result = await rotateBackups(root, 1);

      expect(result).toEqual({ kept: [newer], pruned: [path.join(root, "2026-01-01_000000-9")] });
    });

    test("ignores entries that are not backups", async () => {
      await backupAt("2026-01-01_000000", 1);
      await mkdir(path.join(root, "scratch"));

      expect((await listBackupDirs(root)).map((b) => b.backupId)).toEqual(["2026-01-01_000000"]);
    });

    test("a missing root has none", async () => {
      expect(await listBackupDirs(path.join(root, "missing"))).toEqual([]);
    });
  });

  describe("rotateBackups", () => {
    test("deletes everything beyond the window", async () => {
      const oldest = await backupAt("2026-01-01_000000", 1);
      const middle = await backupAt("2026-01-02_000000", 2);
      const newest = await backupAt("2026-01-03_000000", 3);

      const result = await rotateBackups(root, 2);

      expect(result).toEqual({ kept: [newest, middle], pruned: [oldest] });
      expect(existsSync(oldest)).toBe(false);
    });

    test("a dry run deletes nothing", async () => {
      const oldest = await backupAt("2026-01-01_000000", 1);
      await backupAt("2026-01-02_000000", 2);

      const result = await rotateBackups(root, 1, { dryRun: true });

      expect(result.pruned).toEqual([oldest]);
      expect(existsSync(oldest)).toBe(true);
    });

    test("a protected directory survives even when it is oldest", async () => {
      const oldest = await backupAt("2026-01-01_000000", 1);
      const middle = await backupAt("2026-01-02_000000", 2);
      const newest = await backupAt("2026-01-03_000000", 3);

      const result = await rotateBackups(root, 2, { protect: oldest });

      expect(result).toEqual({ kept: [oldest, newest], pruned: [middle] });
    });
  });

  describe("LATEST", () => {
    test("round trips the absolute path", async () => {
      const dir = await backupAt("2026-01-01_000000", 1);

      await writeLatestPointer(root, dir);

      expect(await readFile(path.join(root, "LATEST"), "utf-8")).toBe(`${dir}\n`);
      expect(await readLatestPointer(root)).toBe(dir);
    });

    test("is null when absent", async () => {
      expect(await readLatestPointer(root)).toBeNull();
    });

    test("finalizing publishes the backup and keeps it", async () => {
      const dir = await backupAt("2026-01-01_000000", 1);
      await backupAt("2026-01-02_000000", 2);

      const result = await finalizeBackup(root, dir, 1);

      expect(result.kept).toEqual([dir]);
      expect(await readLatestPointer(root)).toBe(dir);
    });
  });
});
