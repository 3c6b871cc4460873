/**
 * Environment snapshot and path resolution
 */

import * as os from "node:os";
import type { EnvironmentSnapshot } from "../types";
import { runCommand } from "../utils/exec";
import { isPlainObject } from "../utils/json";
import { resolveConfigPath } from "../utils/path";

/**
 * Home directory of `user` from the passwd database; undefined when the lookup fails
 */
export async function lookupUserHome(user: string): Promise<string | undefined> {
  const result = await runCommand("getent", ["passwd", user]);
  if (!result.success) {
    return undefined;
  }
  // name:password:uid:gid:gecos:home:shell
  const home = result.stdout.split("\n")[0]?.split(":")[5]?.trim();
  return home || undefined;
}

/**
 * Read the process environment once, at the CLI edge
 */
export async function getEnvironment(): Promise<EnvironmentSnapshot> {
  const sudoUser = process.env.SUDO_USER || undefined;
  return {
    home: process.env.HOME || os.homedir(),
    cwd: process.cwd(),
    sudoUser,
    sudoHome: sudoUser ? await lookupUserHome(sudoUser) : undefined,
  };
}

/** Single path fields per section */
const PATH_FIELDS: Record<string, string[]> = {
  paths: ["home", "workingDir", "root"],
  bundle: ["restoreScript", "buildDir"],
};

/** Path list fields per section */
const PATH_LIST_FIELDS: Record<string, string[]> = {
  bindMounts: ["allowedPrefixes"],
  compose: ["scanRoots"],
};

function resolveValue(value: unknown, home: string, baseDir: string): unknown {
  if (typeof value === "string" && value.length > 0) {
    return resolveConfigPath(value, home, baseDir);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, home, baseDir));
  }
  return value;
}

/**
 * Resolve the path-valued fields of a raw (unvalidated) config: "~" expands
 * to home, relative paths resolve against baseDir. Values of the wrong type
 * are passed through for the validator to report.
 */
export function resolvePaths(
  raw: Record<string, unknown>,
  home: string,
  baseDir: string,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = { ...raw };

  for (const [sectionName, fields] of Object.entries({ ...PATH_FIELDS, ...PATH_LIST_FIELDS })) {
    const section = raw[sectionName];
    if (!isPlainObject(section)) {
      continue;
    }

    const copy: Record<string, unknown> = { ...section };
    for (const field of fields) {
      if (field in copy) {
        copy[field] = resolveValue(copy[field], home, baseDir);
      }
    }
    resolved[sectionName] = copy;
  }

  return resolved;
}

/**
 * Read a nested string field from a raw config, e.g. ("paths", "home")
 */
export function readPathField(
  raw: Record<string, unknown>,
  sectionName: string,
  field: string,
): string | undefined {
  const section = raw[sectionName];
  if (!isPlainObject(section)) {
    return undefined;
  }
  const value = section[field];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
