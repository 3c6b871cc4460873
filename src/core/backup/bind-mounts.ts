/**
 * Bind-mount discovery and capture
 *
 * Discovery is an ordered chain of strategies. The first strategy to claim a
 * host path owns it; later strategies only add the workloads that mount it.
 */

import { existsSync } from "node:fs";
import { cp, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { ContainerDetails } from "../../docker/container";
import type { BackupLayout, BindMountCandidate, BindMountOrigin, HomestashConfig } from "../../types";
import { logger } from "../../utils/logger";
import { PathNameRegistry } from "../../utils/naming";
import { isPathUnderDir, stripRoot } from "../../utils/path";
import { describeRejection, mapWithConcurrency } from "../../utils/pool";
import { createTarball } from "../../utils/tar";

export interface ConventionalBind {
  /** Name under bind-mounts/ */
  archiveName: string;
  /** Path relative to the working directory */
  relativePath: string;
  mode: BindMountCandidate["mode"];
}

export const CONVENTIONAL_BINDS: readonly ConventionalBind[] = [
  { archiveName: "homepage-public.tar.gz", relativePath: "public", mode: "archive" },
  { archiveName: "homepage-config.tar.gz", relativePath: "config", mode: "archive" },
  { archiveName: "Caddyfile", relativePath: "Caddyfile", mode: "copy" },
];

export interface DiscoveryContext {
  config: HomestashConfig;
  containers: ContainerDetails[];
  registry: PathNameRegistry;
}

export interface BindMountStrategy {
  origin: BindMountOrigin;
  discover(context: DiscoveryContext): Promise<BindMountCandidate[]>;
}

export interface BindMountReport {
  captured: BindMountCandidate[];
  errors: string[];
}

async function pathKind(p: string): Promise<"directory" | "file" | null> {
  try {
    const stats = await stat(p);
    return stats.isDirectory() ? "directory" : stats.isFile() ? "file" : null;
  } catch {
    return null;
  }
}

/**
 * Registry for bind-mount archive names with the conventional names held
 * back, so no encoded host path can take them
 */
export function createBindMountRegistry(workingDir: string): PathNameRegistry {
  const registry = new PathNameRegistry(".tar.gz");
  for (const bind of CONVENTIONAL_BINDS) {
    registry.reserve(bind.archiveName, path.join(workingDir, bind.relativePath));
  }
  return registry;
}

/** Source path to archive name for every captured bind, under manifests/ */
export const BIND_INDEX_FILE = "bind-mounts.tsv";

export interface BindIndexEntry {
  archiveName: string;
  sourcePath: string;
}

/**
 * Write the index as "<archive name>\t<source path>" lines, sorted by archive name
 */
export async function writeBindIndex(manifestsDir: string, entries: BindIndexEntry[]): Promise<void> {
  const lines = entries
    .map((e) => `${e.archiveName}\t${e.sourcePath}`)
    .sort();
  await mkdir(manifestsDir, { recursive: true });
  await writeFile(path.join(manifestsDir, BIND_INDEX_FILE), lines.length > 0 ? `${lines.join("\n")}\n` : "");
}

/**
 * Entries of a backup's bind index, or null for backups taken without one
 */
export async function readBindIndex(manifestsDir: string): Promise<BindIndexEntry[] | null> {
  const file = path.join(manifestsDir, BIND_INDEX_FILE);
  if (!existsSync(file)) {
    return null;
  }

  const entries: BindIndexEntry[] = [];
  for (const line of (await readFile(file, "utf-8")).split("\n")) {
    const tab = line.indexOf("\t");
    if (tab <= 0) {
      continue;
    }
    entries.push({ archiveName: line.slice(0, tab), sourcePath: line.slice(tab + 1) });
  }
  return entries;
}

/**
 * The name registry an existing backup was written with: its index entries,
 * then the conventional names not already taken. Without an index only the
 * conventional names of `workingDir` are held back.
 */
export async function loadBindMountRegistry(
  layout: BackupLayout,
  workingDir?: string,
): Promise<PathNameRegistry> {
  const index = await readBindIndex(layout.manifestsDir);
  if (!index) {
    return workingDir ? createBindMountRegistry(workingDir) : new PathNameRegistry(".tar.gz");
  }

  const registry = new PathNameRegistry(".tar.gz");
  for (const entry of index) {
    registry.reserve(entry.archiveName, entry.sourcePath);
  }
  if (workingDir) {
    for (const bind of CONVENTIONAL_BINDS) {
      const sourcePath = path.join(workingDir, bind.relativePath);
      if (registry.sourceOf(bind.archiveName) === undefined && !registry.hasSource(sourcePath)) {
        registry.reserve(bind.archiveName, sourcePath);
      }
    }
  }
  return registry;
}

/**
 * ./public, ./config and ./Caddyfile of the working directory
 */
export const conventionalStrategy: BindMountStrategy = {
  origin: "conventional",
  async discover({ config }) {
    const candidates: BindMountCandidate[] = [];

    for (const bind of CONVENTIONAL_BINDS) {
      const sourcePath = path.join(config.paths.workingDir, bind.relativePath);
      const kind = await pathKind(sourcePath);
      const wanted = bind.mode === "archive" ? "directory" : "file";
      if (kind !== wanted) {
        continue;
      }

      candidates.push({
        sourcePath,
        origin: "conventional",
        archiveName: bind.archiveName,
        mode: bind.mode,
        containers: [],
      });
    }

    return candidates;
  },
};

/**
 * Host-path mounts of running workloads under an allowed prefix
 */
export const mountTableStrategy: BindMountStrategy = {
  origin: "mount-table",
  async discover({ config, containers, registry }) {
    const bySource = new Map<string, BindMountCandidate>();

    for (const container of containers) {
      for (const mount of container.mounts) {
        if (mount.type !== "bind" || !mount.source) {
          continue;
        }

        const sourcePath = path.resolve(mount.source);
        const seen = bySource.get(sourcePath);
        if (seen) {
          seen.containers.push(container.name);
          continue;
        }

        const allowed = config.bindMounts.allowedPrefixes.some((prefix) =>
          isPathUnderDir(sourcePath, prefix),
        );
        if (!allowed) {
          logger.debug(`Skipping bind ${sourcePath}: outside the allowed prefixes`);
          continue;
        }
        if ((await pathKind(sourcePath)) === null) {
          logger.debug(`Skipping bind ${sourcePath}: not present on the host`);
          continue;
        }

        bySource.set(sourcePath, {
          sourcePath,
          origin: "mount-table",
          archiveName: registry.nameFor(sourcePath),
          mode: "archive",
          containers: [container.name],
        });
      }
    }

    return [...bySource.values()];
  },
};

export const DEFAULT_STRATEGIES: readonly BindMountStrategy[] = [
  conventionalStrategy,
  mountTableStrategy,
];

/**
 * Run the strategy chain; one candidate per distinct host path
 */
export async function discoverBindMounts(
  context: DiscoveryContext,
  strategies: readonly BindMountStrategy[] = DEFAULT_STRATEGIES,
): Promise<BindMountCandidate[]> {
  const claimed = new Map<string, BindMountCandidate>();

  for (const strategy of strategies) {
    for (const candidate of await strategy.discover(context)) {
      const owner = claimed.get(candidate.sourcePath);
      if (owner) {
        for (const name of candidate.containers) {
          if (!owner.containers.includes(name)) {
            owner.containers.push(name);
          }
        }
        continue;
      }
      claimed.set(candidate.sourcePath, candidate);
    }
  }

  return [...claimed.values()];
}

/**
 * Write one candidate under `bindMountsDir`
 */
export async function captureBindMount(
  config: HomestashConfig,
  candidate: BindMountCandidate,
  bindMountsDir: string,
): Promise<void> {
  const destination = path.join(bindMountsDir, candidate.archiveName);
  const target = candidate.containers.length > 0 ? ` (${candidate.containers.join(", ")})` : "";
  logger.info(`  -> bind ${candidate.sourcePath}${target}`);

  if (candidate.mode === "copy") {
    await cp(candidate.sourcePath, destination, { preserveTimestamps: true });
    return;
  }

  if (candidate.origin === "conventional") {
    const member = `./${path.relative(config.paths.workingDir, candidate.sourcePath)}`;
    await createTarball(destination, config.paths.workingDir, [member]);
    return;
  }

  await createTarball(destination, "/", [stripRoot(candidate.sourcePath)], {
    elevate: config.bindMounts.elevate,
  });
}

/**
 * Capture every candidate with bounded concurrency, collecting failures
 */
export async function captureBindMounts(
  config: HomestashConfig,
  candidates: BindMountCandidate[],
  bindMountsDir: string,
): Promise<BindMountReport> {
  const settled = await mapWithConcurrency(candidates, config.concurrency, (candidate) =>
    captureBindMount(config, candidate, bindMountsDir),
  );

  const report: BindMountReport = { captured: [], errors: [] };
  settled.forEach((outcome, index) => {
    const candidate = candidates[index];
    if (!candidate) {
      return;
    }
    if (outcome.status === "fulfilled") {
      report.captured.push(candidate);
    } else {
      const message = `Failed to capture ${candidate.sourcePath}: ${describeRejection(outcome.reason)}`;
      logger.error(message);
      report.errors.push(message);
    }
  });

  return report;
}
