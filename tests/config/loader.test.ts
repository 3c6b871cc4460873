import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { createDefaultConfig, deepMerge } from "../../src/config/defaults";
import { findConfigFile, loadConfig, loadConfigFile } from "../../src/config/loader";
import { resolvePaths } from "../../src/config/resolver";
import { ConfigError, validateConfig } from "../../src/config/validator";
import type { EnvironmentSnapshot } from "../../src/types";

describe("config loader", () => {
  let tempDir: string;
  let env: EnvironmentSnapshot;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "homestash-config-test-"));
    env = { home: path.join(tempDir, "home"), cwd: path.join(tempDir, "cwd") };
    await mkdir(env.home, { recursive: true });
    await mkdir(env.cwd, { recursive: true });
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfigDir(name: string, fileName: string, content: string): Promise<string> {
    const dir = path.join(tempDir, name);
    await mkdir(dir, { recursive: true });
    const file = path.join(dir, fileName);
    await writeFile(file, content);
    return file;
  }

  describe("defaults", () => {
    test("derive every path from home and the working directory", async () => {
      const config = await loadConfig({ env });

      expect(config.paths).toEqual({
        home: env.home,
        workingDir: env.cwd,
        root: path.join(env.home, "homelab-backups"),
      });
      expect(config.retention.keep).toBe(7);
      expect(config.docker).toEqual({ helperImage: "alpine:latest", network: "proxy" });
      expect(config.bindMounts).toEqual({ allowedPrefixes: [env.home], elevate: false });
      expect(config.compose.scanRoots).toEqual([
        env.cwd,
        env.home,
        path.join(env.home, "docker"),
        path.join(env.home, "homepage"),
      ]);
      expect(config.compose.scanDepth).toBe(3);
      expect(config.certs.fileName).toBe("caddy-rootCA.crt");
      expect(config.bundle.imageName).toBe("homelab-backup");
      expect(config.targetUser).toBeUndefined();
    });

    test("take the invoking sudo user as target user", async () => {
      const config = await loadConfig({ env: { ...env, sudoUser: "alice", sudoHome: env.home } });
      expect(config.targetUser).toBe("alice");
    });

    test("use the sudo user's home rather than root's", async () => {
      const sudoEnv = { home: "/root", cwd: env.cwd, sudoUser: "alice", sudoHome: env.home };

      const config = await loadConfig({ env: sudoEnv, inline: { root: "~/backups" } });

      expect(config.paths.home).toBe(env.home);
      expect(config.paths.root).toBe(path.join(env.home, "backups"));
    });

    test("refuse to guess a sudo user's home that could not be looked up", async () => {
      const sudoEnv = { home: "/root", cwd: env.cwd, sudoUser: "alice" };

      await expect(loadConfig({ env: sudoEnv })).rejects.toThrow(ConfigError);
      await expect(loadConfig({ env: sudoEnv })).rejects.toThrow(/pass --home/);

      const config = await loadConfig({ env: sudoEnv, inline: { home: env.home } });
      expect(config.paths.home).toBe(env.home);
    });
  });

  describe("config file", () => {
    test("resolves relative paths against the file's directory and ~ against home", async () => {
      const file = await writeConfigDir(
        "relative",
        "homestash.config.yaml",
        ["version: '1'", "paths:", "  root: ./backups", "bindMounts:", "  allowedPrefixes: ['~/stacks', /srv]"].join(
          "\n",
        ),
      );

      const config = await loadConfig({ env, configPath: file });

      expect(config.paths.root).toBe(path.join(tempDir, "relative", "backups"));
      expect(config.bindMounts.allowedPrefixes).toEqual([path.join(env.home, "stacks"), "/srv"]);
      // Untouched sections keep their defaults
      expect(config.bindMounts.elevate).toBe(false);
    });

    test("a home override moves every derived default", async () => {
      const file = await writeConfigDir("home-override", "homestash.config.json", JSON.stringify({ paths: { home: "/srv/alice" } }));

      const config = await loadConfig({ env, configPath: file });

      expect(config.paths.root).toBe("/srv/alice/homelab-backups");
      expect(config.bundle.restoreScript).toBe("/srv/alice/homelab-restore.sh");
      expect(config.bindMounts.allowedPrefixes).toEqual(["/srv/alice"]);
    });

    test("is found in the working directory", async () => {
      const dir = path.join(tempDir, "lookup");
      await mkdir(dir, { recursive: true });
      await writeFile(path.join(dir, "homestash.config.yml"), "retention:\n  keep: 3\n");

      expect(findConfigFile(dir)).toBe(path.join(dir, "homestash.config.yml"));
      const config = await loadConfig({ env: { ...env, cwd: dir } });
      expect(config.retention.keep).toBe(3);
    });

    test("reads schedules", async () => {
      const file = await writeConfigDir(
        "schedules",
        "homestash.config.yaml",
        ["schedules:", "  nightly:", "    cron: '0 3 * * *'", "    action: backup"].join("\n"),
      );

      const config = await loadConfig({ env, configPath: file });
      expect(config.schedules).toEqual({ nightly: { cron: "0 3 * * *", action: "backup" } });
    });

    test("an empty file yields the defaults", async () => {
      const file = await writeConfigDir("empty", "homestash.config.yaml", "");
      expect(await loadConfigFile(file)).toEqual({});
    });

    test("rejects a missing file", async () => {
      await expect(loadConfigFile(path.join(tempDir, "nope.yaml"))).rejects.toThrow(ConfigError);
    });

    test("rejects a document that is not a mapping", async () => {
      const file = await writeConfigDir("list", "homestash.config.yaml", "- a\n- b\n");
      await expect(loadConfigFile(file)).rejects.toThrow("Config file must contain a mapping");
    });

    test("rejects invalid YAML", async () => {
      const file = await writeConfigDir("broken", "homestash.config.yaml", "paths: [unclosed\n");
      await expect(loadConfigFile(file)).rejects.toThrow("Failed to parse YAML");
    });

    test("rejects unsupported extensions", async () => {
      const file = await writeConfigDir("toml", "homestash.toml", "keep = 3\n");
      await expect(loadConfigFile(file)).rejects.toThrow("Unsupported config file format: .toml");
    });

    test("rejects invalid values", async () => {
      const file = await writeConfigDir("invalid", "homestash.config.yaml", "retention:\n  keep: 0\n");
      await expect(loadConfig({ env, configPath: file })).rejects.toThrow(
        "retention.keep must be a positive integer",
      );
    });
  });

  describe("inline options", () => {
    test("override the file and resolve against the current directory", async () => {
      const file = await writeConfigDir("inline", "homestash.config.yaml", "retention:\n  keep: 3\nconcurrency: 4\n");

      const config = await loadConfig({
        env,
        configPath: file,
        inline: { keep: 10, root: "out", sudo: true, bindPrefix: ["/etc/pihole"] },
      });

      expect(config.retention.keep).toBe(10);
      expect(config.concurrency).toBe(4);
      expect(config.paths.root).toBe(path.join(env.cwd, "out"));
      expect(config.bindMounts).toEqual({ allowedPrefixes: ["/etc/pihole"], elevate: true });
    });
  });
});

describe("deepMerge", () => {
  test("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { x: 1, y: [1, 2] }, b: 1 }, { a: { y: [3] }, c: 2 })).toEqual({
      a: { x: 1, y: [3] },
      b: 1,
      c: 2,
    });
  });

  test("skips undefined values", () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe("resolvePaths", () => {
  test("leaves non-path fields alone", () => {
    expect(resolvePaths({ docker: { network: "proxy" }, paths: { root: "~/b" } }, "/home/alice", "/etc")).toEqual({
      docker: { network: "proxy" },
      paths: { root: "/home/alice/b" },
    });
  });
});

describe("validateConfig", () => {
  const valid = () => createDefaultConfig({ home: "/home/alice", cwd: "/home/alice" });

  test("accepts the defaults", () => {
    expect(() => validateConfig(valid())).not.toThrow();
  });

  test("rejects a certificate file name with a slash", () => {
    const config = { ...valid(), certs: { ...valid().certs, fileName: "../ca.crt" } };
    expect(() => validateConfig(config)).toThrow("certs.fileName must be a plain file name");
  });

  test("rejects an unknown schedule action", () => {
    const config = { ...valid(), schedules: { nightly: { cron: "0 3 * * *", action: "restore" } } };
    expect(() => validateConfig(config)).toThrow("schedules.nightly.action must be one of: backup, bundle");
  });

  test("rejects a non-boolean failFast", () => {
    expect(() => validateConfig({ ...valid(), failFast: "yes" })).toThrow("failFast must be a boolean");
  });

  test("rejects a missing section", () => {
    const { docker: _docker, ...rest } = valid();
    expect(() => validateConfig(rest)).toThrow("Config must have a 'docker' section");
  });
});
