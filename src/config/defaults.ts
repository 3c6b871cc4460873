/**
 * Default configuration values
 */

import * as path from "node:path";
import type { EnvironmentSnapshot, HomestashConfig } from "../types";
import { isPlainObject } from "../utils/json";

export const CONFIG_VERSION = "1";

export const DEFAULT_RETENTION_KEEP = 7;

export const DEFAULT_CERT_PATH = "/data/caddy/pki/authorities/local/root.crt";

/**
 * Build the defaults for a given home and working directory.
 * Every path-valued default is derived from these two.
 */
export function createDefaultConfig(env: EnvironmentSnapshot): HomestashConfig {
  const { home, cwd } = env;

  return {
    version: CONFIG_VERSION,
    paths: {
      home,
      workingDir: cwd,
      root: path.join(home, "homelab-backups"),
    },
    retention: {
      keep: DEFAULT_RETENTION_KEEP,
    },
    concurrency: 2,
    failFast: false,
    docker: {
      helperImage: "alpine:latest",
      network: "proxy",
    },
    bindMounts: {
      allowedPrefixes: [home],
      elevate: false,
    },
    compose: {
      scanRoots: [cwd, home, path.join(home, "docker"), path.join(home, "homepage")],
      scanDepth: 3,
    },
    certs: {
      container: "caddy",
      path: DEFAULT_CERT_PATH,
      fileName: "caddy-rootCA.crt",
    },
    bundle: {
      imageName: "homelab-backup",
      baseImage: "busybox:latest",
      restoreScript: path.join(home, "homelab-restore.sh"),
      buildDir: home,
    },
    targetUser: env.sudoUser,
    schedules: {},
  };
}

/**
 * Deep merge two objects, with source overriding target.
 * Arrays and scalars are replaced, nested objects are merged.
 */
export function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
