/**
 * Shared option handling for the CLI commands
 */

import { extractInlineOptions, INLINE_CONFIG_OPTIONS, loadConfig } from "../config";
import { ConfigError } from "../config/validator";
import { UsageError } from "../core/errors";
import type { HomestashConfig } from "../types";
import { setLogLevel } from "../utils/logger";
import { color, ui } from "./ui";

/**
 * Options every command accepts
 */
export const BASE_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
} as const;

/**
 * Base options plus the inline config overrides
 */
export const CONFIG_OPTIONS = {
  ...BASE_OPTIONS,
  ...INLINE_CONFIG_OPTIONS,
} as const;

export const INLINE_HELP = `${color.dim("CONFIG OPTIONS:")}
  -c, --config <path>          Config file (default: ./homestash.config.yaml if present)
      --root <dir>             Backup root (default: ~/homelab-backups)
      --home <dir>             Home directory of the stack owner
      --working-dir <dir>      Directory holding ./public, ./config, ./Caddyfile and ./stack
      --keep <n>               Number of backups to keep (default: 7)
      --concurrency <n>        Helper processes in flight (default: 2)
      --fail-fast              Abort at the first failed step
      --network <name>         Shared proxy network (default: proxy)
      --target-user <user>     Owner of the backup tree before bundling
      --sudo                   Run host tar through sudo
      --bind-prefix <dir>      Allowed bind-mount prefix (can be repeated)`;

/**
 * Apply --verbose and build the effective configuration from the parsed flags
 */
export async function resolveCommandConfig(values: Record<string, unknown>): Promise<HomestashConfig> {
  if (values.verbose === true) {
    setLogLevel("debug");
  }

  return loadConfig({
    configPath: typeof values.config === "string" ? values.config : undefined,
    inline: extractInlineOptions(values),
  });
}

/**
 * Print a command failure and return the exit code
 */
export function reportFailure(label: string, error: unknown, verbose: boolean): number {
  if (error instanceof UsageError) {
    ui.error(error.message);
    ui.message(error.usage);
    return 1;
  }

  const message = error instanceof Error ? error.message : String(error);
  const prefix = error instanceof ConfigError ? "Invalid configuration" : label;
  ui.error(`${prefix}: ${message}`);
  if (verbose) {
    console.error(error);
  }
  return 1;
}
