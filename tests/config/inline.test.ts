import { describe, expect, test } from "vitest";
import { buildInlineConfig, extractInlineOptions } from "../../src/config/inline";
import { ConfigError } from "../../src/config/validator";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("reads parsed flag values", () => {
      const options = extractInlineOptions({
        root: "/srv/backups",
        "working-dir": "/srv/stack",
        keep: "14",
        concurrency: "4",
        "fail-fast": true,
        "target-user": "alice",
        sudo: true,
        "bind-prefix": ["/etc/pihole", "/etc/caddy"],
      });

      expect(options).toEqual({
        root: "/srv/backups",
        home: undefined,
        workingDir: "/srv/stack",
        keep: 14,
        concurrency: 4,
        failFast: true,
        network: undefined,
        targetUser: "alice",
        sudo: true,
        bindPrefix: ["/etc/pihole", "/etc/caddy"],
      });
    });

    test("ignores values of the wrong type", () => {
      const options = extractInlineOptions({ root: true, sudo: "yes" });
      expect(options.root).toBeUndefined();
      expect(options.sudo).toBeUndefined();
    });

    test("rejects a non-numeric keep", () => {
      expect(() => extractInlineOptions({ keep: "seven" })).toThrow(ConfigError);
      expect(() => extractInlineOptions({ keep: "seven" })).toThrow(
        '--keep must be a positive integer, got "seven"',
      );
    });

    test("rejects zero concurrency", () => {
      expect(() => extractInlineOptions({ concurrency: "0" })).toThrow(
        '--concurrency must be a positive integer, got "0"',
      );
    });
  });

  describe("buildInlineConfig", () => {
    test("builds nothing from no options", () => {
      expect(buildInlineConfig({})).toEqual({});
    });

    test("maps flags onto config sections", () => {
      expect(
        buildInlineConfig({
          home: "/home/alice",
          keep: 3,
          concurrency: 1,
          failFast: false,
          network: "web",
          targetUser: "alice:alice",
          sudo: false,
          bindPrefix: ["/srv"],
        }),
      ).toEqual({
        paths: { home: "/home/alice" },
        retention: { keep: 3 },
        concurrency: 1,
        failFast: false,
        docker: { network: "web" },
        targetUser: "alice:alice",
        bindMounts: { elevate: false, allowedPrefixes: ["/srv"] },
      });
    });

    test("an empty bind prefix list leaves the default prefixes", () => {
      expect(buildInlineConfig({ bindPrefix: [] })).toEqual({});
    });
  });
});
