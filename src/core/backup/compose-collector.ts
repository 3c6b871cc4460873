/**
 * Compose deployment files and env files of active and known stacks
 */

import { existsSync } from "node:fs";
import { cp, stat } from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { composeProjectOf } from "../../docker/compose";
import type { ContainerDetails } from "../../docker/container";
import type { ComposeCandidate, ComposeOrigin, HomestashConfig } from "../../types";
import { logger } from "../../utils/logger";
import { PathNameRegistry } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";

export const COMPOSE_SCAN_PATTERNS = ["**/docker-compose.y*ml", "**/compose.y*ml", "**/.env"];

export interface ComposeArtifact extends ComposeCandidate {
  /** File name under compose-files/ */
  artifactName: string;
}

export interface ComposeReport {
  copied: ComposeArtifact[];
  /** Sources whose destination already existed */
  skipped: ComposeArtifact[];
  errors: string[];
}

export interface ComposeStrategy {
  origin: ComposeOrigin;
  discover(config: HomestashConfig, containers: ContainerDetails[]): Promise<string[]>;
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Files named by the compose labels of running workloads, plus their .env
 */
export const labelStrategy: ComposeStrategy = {
  origin: "labels",
  async discover(_config, containers) {
    const files: string[] = [];

    for (const container of containers) {
      const project = composeProjectOf(container);
      if (!project) {
        logger.debug(`Container ${container.name} has no compose labels`);
        continue;
      }
      if (!(await isDirectory(project.workingDir))) {
        logger.debug(`Compose working dir ${project.workingDir} of ${container.name} is gone`);
        continue;
      }

      for (const file of [...project.configFiles, path.join(project.workingDir, ".env")]) {
        if (await isFile(file)) {
          files.push(file);
        }
      }
    }

    return files;
  },
};

/**
 * Shallow scan of the usual stack locations
 */
export const scanStrategy: ComposeStrategy = {
  origin: "scan",
  async discover(config) {
    const roots = [...new Set(config.compose.scanRoots.map((root) => path.resolve(root)))];
    const files: string[] = [];

    for (const root of roots) {
      if (!(await isDirectory(root))) {
        logger.debug(`Compose scan root ${root} does not exist`);
        continue;
      }

      const found = await fg(COMPOSE_SCAN_PATTERNS, {
        cwd: root,
        absolute: true,
        dot: true,
        onlyFiles: true,
        // scanDepth counts files directly under the root as depth 1
        deep: config.compose.scanDepth - 1,
        followSymbolicLinks: false,
        suppressErrors: true,
      });

      // Earlier backups live under home too
      files.push(...found.sort().filter((file) => !isPathWithinDir(file, config.paths.root)));
    }

    return files;
  },
};

export const DEFAULT_COMPOSE_STRATEGIES: readonly ComposeStrategy[] = [labelStrategy, scanStrategy];

/**
 * Run the strategy chain; one artifact per distinct source path, first strategy wins
 */
export async function discoverComposeFiles(
  config: HomestashConfig,
  containers: ContainerDetails[],
  registry: PathNameRegistry = new PathNameRegistry(),
  strategies: readonly ComposeStrategy[] = DEFAULT_COMPOSE_STRATEGIES,
): Promise<ComposeArtifact[]> {
  const claimed = new Map<string, ComposeArtifact>();

  for (const strategy of strategies) {
    for (const file of await strategy.discover(config, containers)) {
      const sourcePath = path.resolve(file);
      if (claimed.has(sourcePath)) {
        continue;
      }
      claimed.set(sourcePath, {
        sourcePath,
        origin: strategy.origin,
        artifactName: registry.nameFor(sourcePath),
      });
    }
  }

  return [...claimed.values()];
}

/**
 * Copy artifacts into `composeDir`, leaving any destination that already exists
 */
export async function copyComposeFiles(
  artifacts: ComposeArtifact[],
  composeDir: string,
): Promise<ComposeReport> {
  const report: ComposeReport = { copied: [], skipped: [], errors: [] };

  for (const artifact of artifacts) {
    const destination = path.join(composeDir, artifact.artifactName);
    if (existsSync(destination)) {
      report.skipped.push(artifact);
      continue;
    }

    try {
      await cp(artifact.sourcePath, destination, { preserveTimestamps: true });
      logger.debug(`  -> ${artifact.sourcePath} (${artifact.origin})`);
      report.copied.push(artifact);
    } catch (error) {
      const message = `Failed to copy ${artifact.sourcePath}: ${error instanceof Error ? error.message : String(error)}`;
      logger.error(message);
      report.errors.push(message);
    }
  }

  return report;
}
