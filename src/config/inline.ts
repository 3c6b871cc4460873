/**
 * Inline configuration parsing (CLI flags that override the config file)
 */

import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Retention root */
  root?: string;
  /** Home directory of the stack owner */
  home?: string;
  /** Working directory holding ./public, ./config, ./Caddyfile */
  workingDir?: string;
  /** Number of backups to keep */
  keep?: number;
  /** Helper processes in flight */
  concurrency?: number;
  /** Abort at the first failed step */
  failFast?: boolean;
  /** Shared network name */
  network?: string;
  /** Owner of the backup tree before bundling */
  targetUser?: string;
  /** Prefix host tar invocations with sudo */
  sudo?: boolean;
  /** Allowed bind-mount prefixes (can be repeated) */
  bindPrefix?: string[];
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  root: { type: "string" as const },
  home: { type: "string" as const },
  "working-dir": { type: "string" as const },
  keep: { type: "string" as const },
  concurrency: { type: "string" as const },
  "fail-fast": { type: "boolean" as const },
  network: { type: "string" as const },
  "target-user": { type: "string" as const },
  sudo: { type: "boolean" as const },
  "bind-prefix": { type: "string" as const, multiple: true },
} as const;

function readString(values: Record<string, unknown>, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

function readBoolean(values: Record<string, unknown>, key: string): boolean | undefined {
  const value = values[key];
  return typeof value === "boolean" ? value : undefined;
}

function readStrings(values: Record<string, unknown>, key: string): string[] | undefined {
  const value = values[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((v): v is string => typeof v === "string");
}

function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  return {
    root: readString(values, "root"),
    home: readString(values, "home"),
    workingDir: readString(values, "working-dir"),
    keep: parsePositiveInt(readString(values, "keep"), "keep"),
    concurrency: parsePositiveInt(readString(values, "concurrency"), "concurrency"),
    failFast: readBoolean(values, "fail-fast"),
    network: readString(values, "network"),
    targetUser: readString(values, "target-user"),
    sudo: readBoolean(values, "sudo"),
    bindPrefix: readStrings(values, "bind-prefix"),
  };
}

/**
 * Build a partial config from inline options. Paths are left as given and
 * resolved by the loader against the current directory.
 */
export function buildInlineConfig(options: InlineConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (options.home || options.workingDir || options.root) {
    config.paths = {
      ...(options.home ? { home: options.home } : {}),
      ...(options.workingDir ? { workingDir: options.workingDir } : {}),
      ...(options.root ? { root: options.root } : {}),
    };
  }

  if (options.keep !== undefined) {
    config.retention = { keep: options.keep };
  }

  if (options.concurrency !== undefined) {
    config.concurrency = options.concurrency;
  }

  if (options.failFast !== undefined) {
    config.failFast = options.failFast;
  }

  if (options.network) {
    config.docker = { network: options.network };
  }

  if (options.targetUser) {
    config.targetUser = options.targetUser;
  }

  if (options.sudo !== undefined || (options.bindPrefix && options.bindPrefix.length > 0)) {
    config.bindMounts = {
      ...(options.sudo !== undefined ? { elevate: options.sudo } : {}),
      ...(options.bindPrefix && options.bindPrefix.length > 0
        ? { allowedPrefixes: options.bindPrefix }
        : {}),
    };
  }

  return config;
}

