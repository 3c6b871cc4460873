import { existsSync } from "node:fs";
import { readFile, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { runBackup } from "../../src/core/backup/orchestrator";
import { packageBackup, runBundle } from "../../src/core/bundle/builder";
import { FALLBACK_RESTORE_SCRIPT, extractionCommands, renderDockerfile } from "../../src/core/bundle/templates";
import { BundleError } from "../../src/core/errors";
import { type FakeHost, installFakeHost, readFakeArchive } from "../helpers/fake-host";
import { createSandbox, type Sandbox, steppingClock } from "../helpers/sandbox";

vi.mock("../../src/utils/exec", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/utils/exec")>();
  const { runOnFakeHost } = await import("../helpers/fake-host");
  return { ...actual, runCommand: runOnFakeHost };
});

describe("bundle", () => {
  let host: FakeHost;
  let sandbox: Sandbox;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    host = installFakeHost();
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await sandbox.cleanup();
  });

  describe("packageBackup", () => {
    test("builds a tagged image from a copy of the backup", async () => {
      host.addVolume("pihole_data", { "gravity.db": "A" });
      const backup = await runBackup(sandbox.config, { now: steppingClock() });

      const result = await packageBackup(sandbox.config, backup.backupDir, {
        now: () => new Date(2026, 7, 12, 22, 43, 10),
      });

      expect(result.imageTag).toBe("homelab-backup:2026-08-12_224310");
      expect(result.buildRoot).toBe(path.join(sandbox.home, "homelab-image-build-2026-08-12_224310"));
      expect(result.bundleDir).toBe(path.join(result.buildRoot, "bundle"));
      expect(host.builds.get(result.imageTag)).toBe(result.buildRoot);
      expect(
        readFakeArchive(path.join(result.bundleDir, "backup", "volumes", "pihole_data.tar.gz")),
      ).toEqual({ "gravity.db": "A" });
    });

    test("writes the fallback restore script when none is configured", async () => {
      const backup = await runBackup(sandbox.config, { now: steppingClock() });

      const result = await packageBackup(sandbox.config, backup.backupDir);

      const script = path.join(result.bundleDir, "homelab-restore.sh");
      expect(result.customRestoreScript).toBe(false);
      expect(await readFile(script, "utf-8")).toBe(FALLBACK_RESTORE_SCRIPT);
      expect((await stat(script)).mode & 0o777).toBe(0o755);
    });

    test("ships the host restore script when it exists", async () => {
      await writeFile(sandbox.config.bundle.restoreScript, "#!/bin/sh\necho restoring\n");
      const backup = await runBackup(sandbox.config, { now: steppingClock() });

      const result = await packageBackup(sandbox.config, backup.backupDir);

      expect(result.customRestoreScript).toBe(true);
      expect(await readFile(path.join(result.bundleDir, "homelab-restore.sh"), "utf-8")).toBe(
        "#!/bin/sh\necho restoring\n",
      );
    });

    test("writes the README and Dockerfile", async () => {
      const backup = await runBackup(sandbox.config, { now: steppingClock() });
      const created = new Date(2026, 7, 12, 22, 43, 10);

      const result = await packageBackup(sandbox.config, backup.backupDir, { now: () => created });

      expect(await readFile(path.join(result.buildRoot, "Dockerfile"), "utf-8")).toBe(
        renderDockerfile("busybox:latest", result.imageTag, created),
      );
      const readme = await readFile(path.join(result.bundleDir, "README.txt"), "utf-8");
      expect(readme).toContain(`  docker create --name homelab-bundle ${result.imageTag}\n`);
    });

    test("two packages in the same second get separate build roots", async () => {
      const backup = await runBackup(sandbox.config, { now: steppingClock() });
      const now = () => new Date(2026, 7, 12, 22, 43, 10);

      const first = await packageBackup(sandbox.config, backup.backupDir, { now });
      const second = await packageBackup(sandbox.config, backup.backupDir, { now });

      expect(second.buildRoot).toBe(`${first.buildRoot}-2`);
    });

    test("rejects a missing backup folder", async () => {
      const missing = path.join(sandbox.base, "missing");

      await expect(packageBackup(sandbox.config, missing)).rejects.toThrow(`Backup folder not found: ${missing}`);
      expect(host.builds.size).toBe(0);
    });

    test("wraps a failed build", async () => {
      const backup = await runBackup(sandbox.config, { now: steppingClock() });
      host.failOn((command, args) => command === "docker" && args[0] === "build", "no space left on device");

      await expect(packageBackup(sandbox.config, backup.backupDir)).rejects.toBeInstanceOf(BundleError);
    });
  });

  describe("runBundle", () => {
    test("backs up, hands the tree to the target user and builds", async () => {
      const config = { ...sandbox.config, targetUser: "alice" };

      const result = await runBundle(config, { now: steppingClock() });

      expect(result.report.complete).toBe(true);
      expect(host.chowns).toEqual([{ owner: "alice", dir: config.paths.root }]);
      expect(host.builds.get(result.imageTag)).toBe(result.buildRoot);
      expect(existsSync(path.join(result.buildRoot, "bundle", "backup", "manifests"))).toBe(true);
    });

    test("skips the ownership change without a target user", async () => {
      await runBundle(sandbox.config, { now: steppingClock() });
      expect(host.chowns).toEqual([]);
    });

    test("refuses to package a partial backup", async () => {
      host.addVolume("pihole_data");
      host.failOn((command, args) => command === "docker" && args[0] === "run");

      const bundle = runBundle(sandbox.config, { now: steppingClock() });

      await expect(bundle).rejects.toBeInstanceOf(BundleError);
      await expect(bundle).rejects.toThrow("(failed: volumes); not bundling");
      expect(host.builds.size).toBe(0);
    });

    test("a failed ownership change stops the bundle", async () => {
      host.failOn((command) => command === "chown", "operation not permitted");

      await expect(runBundle({ ...sandbox.config, targetUser: "alice" }, { now: steppingClock() })).rejects.toThrow(
        `Failed to chown ${sandbox.config.paths.root} to alice: operation not permitted`,
      );
    });
  });
});

describe("templates", () => {
  test("extraction commands name the image", () => {
    expect(extractionCommands("homelab-backup:2026-08-12_224310")).toEqual([
      "docker create --name homelab-bundle homelab-backup:2026-08-12_224310",
      "docker cp homelab-bundle:/bundle ./bundle",
      "docker rm homelab-bundle",
    ]);
  });

  test("the Dockerfile labels the creation time", () => {
    const dockerfile = renderDockerfile("busybox:latest", "homelab-backup:x", new Date("2026-08-12T20:43:10Z"));
    expect(dockerfile.split("\n")[0]).toBe("FROM busybox:latest");
    expect(dockerfile).toContain('org.opencontainers.image.created="2026-08-12T20:43:10.000Z"');
    expect(dockerfile).toContain("COPY bundle /bundle\n");
  });
});
