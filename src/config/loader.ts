/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { EnvironmentSnapshot, HomestashConfig } from "../types";
import { isPlainObject } from "../utils/json";
import { resolveConfigPath } from "../utils/path";
import { createDefaultConfig, deepMerge } from "./defaults";
import { buildInlineConfig, type InlineConfigOptions } from "./inline";
import { getEnvironment, readPathField, resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export const CONFIG_FILE_NAMES = [
  "homestash.config.yaml",
  "homestash.config.yml",
  "homestash.config.json",
];

export interface LoadConfigOptions {
  /** Explicit config file; otherwise one is looked up in the working directory */
  configPath?: string;
  inline?: InlineConfigOptions;
  /** Defaults to the current process environment */
  env?: EnvironmentSnapshot;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Read and parse a config file without merging or validating it
 */
export async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf-8");
  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());

  // An empty YAML document parses to undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${absolutePath}`);
  }
  return parsed;
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath) && statSync(configPath).isFile()) {
      return configPath;
    }
  }

  return null;
}

/**
 * Build the effective configuration: environment-derived defaults, then the
 * config file (paths relative to its directory), then inline flags (paths
 * relative to the current directory).
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<HomestashConfig> {
  const env = options.env ?? (await getEnvironment());

  const configPath = options.configPath
    ? path.resolve(env.cwd, options.configPath)
    : findConfigFile(env.cwd);
  const fileRaw = configPath ? await loadConfigFile(configPath) : {};
  const fileDir = configPath ? path.dirname(configPath) : env.cwd;
  const inlineRaw = buildInlineConfig(options.inline ?? {});

  // Under sudo HOME is root's; the stacks live under the invoking user's home
  const envHome = env.sudoUser ? env.sudoHome : env.home;
  const tildeHome = envHome ?? env.home;

  // Home and working directory come first: every other default derives from them
  const pick = (field: string): string | undefined => {
    const inlineValue = readPathField(inlineRaw, "paths", field);
    if (inlineValue) {
      return resolveConfigPath(inlineValue, tildeHome, env.cwd);
    }
    const fileValue = readPathField(fileRaw, "paths", field);
    return fileValue ? resolveConfigPath(fileValue, tildeHome, fileDir) : undefined;
  };
  const home = pick("home") ?? envHome;
  if (!home) {
    throw new ConfigError(
      `Could not look up the home directory of sudo user ${env.sudoUser ?? ""}; pass --home or set paths.home`,
    );
  }
  const workingDir = pick("workingDir") ?? env.cwd;

  const defaults = createDefaultConfig({ home, cwd: workingDir, sudoUser: env.sudoUser });
  const merged = deepMerge(
    deepMerge(defaults, resolvePaths(fileRaw, home, fileDir)),
    resolvePaths(inlineRaw, home, env.cwd),
  );

  validateConfig(merged);

  return merged;
}
