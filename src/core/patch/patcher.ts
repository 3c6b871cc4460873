/**
 * Add bind-mount archives missing from an existing backup
 */

import { existsSync } from "node:fs";
import { mkdir, readdir } from "node:fs/promises";
import * as path from "node:path";
import { inspectContainer } from "../../docker/container";
import type { HomestashConfig } from "../../types";
import { logger as rootLogger } from "../../utils/logger";
import { ARCHIVE_EXTENSION, type PathNameRegistry } from "../../utils/naming";
import { isPathWithinDir, stripRoot } from "../../utils/path";
import { createTarball } from "../../utils/tar";
import { loadBindMountRegistry, readBindIndex, writeBindIndex } from "../backup/bind-mounts";
import { describeLayout } from "../backup/layout";
import { type PackageResult, packageBackup } from "../bundle/builder";
import { listBackupDirs, readLatestPointer } from "../cleanup/rotation";
import { errorMessage, UsageError } from "../errors";

const logger = rootLogger.child("patch");

export const DEFAULT_PATCH_CONTAINERS = ["pihole", "caddy", "homepage"];

/** System paths the DNS sinkhole and proxy keep their state in */
export const SYSTEM_PREFIXES = ["/etc/pihole", "/etc/dnsmasq.d", "/etc/caddy", "/etc/caddy_config"];

/** Captured whenever present, mounted or not */
export const ALWAYS_INCLUDED = ["/etc/pihole", "/etc/dnsmasq.d"];

export const PATCH_USAGE =
  "Run a backup first (homestash backup) or pass --backup /path/to/backup";

export interface PatchOptions {
  backupDir?: string;
  containers?: string[];
  extraPrefixes?: string[];
  dryRun?: boolean;
  /** Package the patched backup into a new bundle image */
  rebuildImage?: boolean;
}

export interface PatchCandidate {
  container: string;
  sourcePath: string;
  destination: string;
  archiveName: string;
}

export interface PatchResult {
  backupDir: string;
  before: string[];
  missing: PatchCandidate[];
  created: string[];
  after: string[];
  errors: string[];
  warnings: string[];
  image: PackageResult | null;
}

async function listArchives(dir: string): Promise<string[]> {
  if (!existsSync(dir)) {
    return [];
  }
  return (await readdir(dir)).filter((name) => name.endsWith(ARCHIVE_EXTENSION)).sort();
}

/**
 * Backup to patch: the explicit one, else LATEST, else the most recent directory
 */
export async function resolvePatchTarget(
  config: HomestashConfig,
  explicit?: string,
): Promise<string> {
  if (explicit) {
    const resolved = path.resolve(explicit);
    if (!existsSync(resolved)) {
      throw new UsageError(`Backup directory not found: ${resolved}`, PATCH_USAGE);
    }
    return resolved;
  }

  const latest = await readLatestPointer(config.paths.root);
  if (latest && existsSync(latest)) {
    return latest;
  }

  const [newest] = await listBackupDirs(config.paths.root);
  if (!newest) {
    throw new UsageError("Could not resolve a backup directory", PATCH_USAGE);
  }
  return newest.dir;
}

/**
 * Home, the system prefixes, then extras; duplicates removed, order kept
 */
export function allowedPatchPrefixes(home: string, extras: string[] = []): string[] {
  return [...new Set([home, ...SYSTEM_PREFIXES, ...extras].map((p) => path.resolve(p)))];
}

/**
 * Paths the named containers bind-mount (plus the always-included system
 * paths), limited to the allowed prefixes and deduplicated by source.
 * Archive names come from the backup's own registry.
 */
export async function collectPatchCandidates(
  containers: string[],
  prefixes: string[],
  registry: PathNameRegistry,
  warnings: string[],
): Promise<PatchCandidate[]> {
  const isAllowed = (p: string): boolean => prefixes.some((prefix) => isPathWithinDir(p, prefix));
  const candidates: PatchCandidate[] = [];
  const seen = new Set<string>();

  const add = (container: string, sourcePath: string, destination: string): void => {
    if (seen.has(sourcePath)) {
      return;
    }
    seen.add(sourcePath);
    candidates.push({ container, sourcePath, destination, archiveName: registry.nameFor(sourcePath) });
  };

  for (const systemPath of ALWAYS_INCLUDED) {
    if (isAllowed(systemPath) && existsSync(systemPath)) {
      add("pihole", systemPath, systemPath);
    }
  }

  let found = 0;
  for (const name of containers) {
    const details = await inspectContainer(name);
    if (!details) {
      continue;
    }
    found++;

    for (const mount of details.mounts) {
      if (mount.type !== "bind" || !mount.source || !mount.destination) {
        continue;
      }
      const sourcePath = path.resolve(mount.source);
      if (existsSync(sourcePath) && isAllowed(sourcePath)) {
        add(name, sourcePath, mount.destination);
      }
    }
  }

  if (found === 0 && containers.length > 0) {
    warnings.push(`None of the containers were found: ${containers.join(", ")}`);
  }

  return candidates;
}

export async function patchBackup(
  config: HomestashConfig,
  options: PatchOptions = {},
): Promise<PatchResult> {
  const backupDir = await resolvePatchTarget(config, options.backupDir);
  const layout = describeLayout(backupDir);
  logger.info(`Using backup: ${layout.dir}`);

  const warnings: string[] = [];
  const prefixes = allowedPatchPrefixes(config.paths.home, options.extraPrefixes);
  const registry = await loadBindMountRegistry(layout, config.paths.workingDir);
  const candidates = await collectPatchCandidates(
    options.containers ?? DEFAULT_PATCH_CONTAINERS,
    prefixes,
    registry,
    warnings,
  );
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const before = await listArchives(layout.bindMountsDir);
  const existing = new Set(before);
  const missing = candidates.filter((c) => !existing.has(c.archiveName));

  const created: string[] = [];
  const errors: string[] = [];

  if (missing.length === 0) {
    logger.info("Nothing missing; backup already contains all targeted bind mounts");
  } else if (!options.dryRun) {
    await mkdir(layout.bindMountsDir, { recursive: true });
  }

  for (const candidate of missing) {
    const archivePath = path.join(layout.bindMountsDir, candidate.archiveName);
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would archive: ${candidate.sourcePath} -> ${archivePath}`);
      created.push(candidate.archiveName);
      continue;
    }

    logger.info(`Archiving ${candidate.sourcePath} (from ${candidate.container}) -> ${archivePath}`);
    try {
      await createTarball(archivePath, "/", [stripRoot(candidate.sourcePath)], {
        elevate: config.bindMounts.elevate,
      });
      created.push(candidate.archiveName);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(message);
      errors.push(message);
    }
  }

  if (!options.dryRun && created.length > 0) {
    const archived = new Set(created);
    await writeBindIndex(layout.manifestsDir, [
      ...((await readBindIndex(layout.manifestsDir)) ?? []),
      ...missing.filter((c) => archived.has(c.archiveName)),
    ]);
  }

  const after = options.dryRun ? [...before, ...created].sort() : await listArchives(layout.bindMountsDir);

  let image: PackageResult | null = null;
  if (options.rebuildImage && !options.dryRun) {
    image = await packageBackup(config, layout.dir);
  }

  return { backupDir: layout.dir, before, missing, created, after, errors, warnings, image };
}
