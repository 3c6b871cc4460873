/**
 * Restore orchestration
 */

import { existsSync } from "node:fs";
import { cp, mkdir, readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { isDockerAvailable } from "../../docker/client";
import { composeUp } from "../../docker/compose";
import { loadImages } from "../../docker/image";
import { ensureNetwork } from "../../docker/network";
import type { BackupLayout, HomestashConfig } from "../../types";
import { logger as rootLogger } from "../../utils/logger";
import { ARCHIVE_EXTENSION } from "../../utils/naming";
import { extractTarball } from "../../utils/tar";
import { CONVENTIONAL_BINDS } from "../backup/bind-mounts";
import { describeLayout } from "../backup/layout";
import { restoreVolumes, volumeNameFromArchive } from "../backup/volume-archiver";
import { errorMessage, PrerequisiteError, UsageError } from "../errors";

const logger = rootLogger.child("restore");

export const RESTORE_USAGE = "Usage: homestash restore /path/to/homelab-backups/<TIMESTAMP>";

const COMPOSE_FILE_PATTERN = /^(docker-)?compose\.ya?ml$/;

// ".2", ".3", ... appended when two source paths encode to the same name
const COLLISION_SUFFIX = /\.(\d+)$/;

export interface RestoreOptions {
  /** Start each restored compose project (default true) */
  start?: boolean;
  /** Extract the encoded host-path archives back to "/" */
  absoluteBinds?: boolean;
  /** Load images.tar when present (default true) */
  loadImages?: boolean;
}

export interface ComposeProjectRestore {
  /** Encoded directory the files came from, e.g. "home__alice__app" */
  project: string;
  dir: string;
  files: string[];
  started: boolean;
}

export interface RestoreReport {
  backupDir: string;
  volumesRestored: string[];
  networkCreated: boolean;
  conventionalRestored: string[];
  absoluteBindsRestored: string[];
  imagesLoaded: boolean;
  composeProjects: ComposeProjectRestore[];
  /** Root CA to re-trust on clients, when one was captured */
  certificatePath: string | null;
  errors: string[];
}

async function listFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) {
    return [];
  }
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort();
}

/**
 * Check the restore source before anything is touched
 */
export async function validateBackupDir(backupDir: string | undefined): Promise<BackupLayout> {
  if (!backupDir) {
    throw new UsageError("No backup directory given", RESTORE_USAGE);
  }

  const resolved = path.resolve(backupDir);
  let isDirectory = false;
  try {
    isDirectory = (await stat(resolved)).isDirectory();
  } catch {
    isDirectory = false;
  }

  if (!isDirectory) {
    throw new UsageError(`Backup directory not found: ${resolved}`, RESTORE_USAGE);
  }

  return describeLayout(resolved);
}

export interface ComposeArtifactName {
  /** Encoded directory, with the collision suffix when the name had one */
  project: string;
  fileName: string;
}

/**
 * Split a compose-files/ name into its project and file name:
 * "home__alice__app__compose.yml.2" is compose.yml of project "home__alice__app.2".
 * Null for names without a directory part.
 */
export function parseComposeArtifactName(name: string): ComposeArtifactName | null {
  const split = name.lastIndexOf("__");
  if (split <= 0 || split + 2 >= name.length) {
    return null;
  }

  const project = name.slice(0, split);
  const fileName = name.slice(split + 2);
  const suffix = COLLISION_SUFFIX.exec(fileName);
  if (suffix && suffix.index > 0) {
    return { project: `${project}.${suffix[1]}`, fileName: fileName.slice(0, suffix.index) };
  }
  return { project, fileName };
}

/**
 * Group compose-files/ names by project; names that belong to no project are skipped with a warning
 */
export function groupComposeFiles(names: string[]): Map<string, string[]> {
  const projects = new Map<string, string[]>();

  for (const name of names) {
    const parsed = parseComposeArtifactName(name);
    if (!parsed) {
      logger.warn(`Skipping compose file ${name}: no project directory in its name`);
      continue;
    }
    const files = projects.get(parsed.project) ?? [];
    files.push(name);
    projects.set(parsed.project, files);
  }

  return projects;
}

async function restoreComposeProjects(
  config: HomestashConfig,
  layout: BackupLayout,
  start: boolean,
): Promise<ComposeProjectRestore[]> {
  const grouped = groupComposeFiles(await listFiles(layout.composeDir));
  const restored: ComposeProjectRestore[] = [];

  for (const [project, names] of grouped) {
    const dir = path.join(config.paths.workingDir, "stack", project);
    await mkdir(dir, { recursive: true });

    const files: string[] = [];
    for (const name of names) {
      const parsed = parseComposeArtifactName(name);
      if (!parsed) {
        continue;
      }
      await cp(path.join(layout.composeDir, name), path.join(dir, parsed.fileName), {
        preserveTimestamps: true,
      });
      files.push(parsed.fileName);
    }

    const hasDescriptor = files.some((f) => COMPOSE_FILE_PATTERN.test(f));
    let started = false;
    if (start && hasDescriptor) {
      await composeUp(dir);
      started = true;
    }

    restored.push({ project, dir, files, started });
  }

  return restored;
}

/**
 * Rebuild volumes, the shared network and the conventional binds from a
 * backup, then bring the captured stacks back up
 */
export async function runRestore(
  config: HomestashConfig,
  backupDir: string | undefined,
  options: RestoreOptions = {},
): Promise<RestoreReport> {
  const layout = await validateBackupDir(backupDir);

  logger.step("Ensuring Docker is available");
  if (!(await isDockerAvailable())) {
    throw new PrerequisiteError("Docker is not available. Is the daemon running?");
  }

  const report: RestoreReport = {
    backupDir: layout.dir,
    volumesRestored: [],
    networkCreated: false,
    conventionalRestored: [],
    absoluteBindsRestored: [],
    imagesLoaded: false,
    composeProjects: [],
    certificatePath: null,
    errors: [],
  };

  logger.step("Recreating volumes and restoring data");
  const volumeNames = (await listFiles(layout.volumesDir))
    .map(volumeNameFromArchive)
    .filter((name): name is string => name !== null);
  const volumes = await restoreVolumes(config, volumeNames, layout.volumesDir);
  report.volumesRestored = volumes.restored;
  report.errors.push(...volumes.errors);

  logger.step(`Recreating shared network '${config.docker.network}'`);
  report.networkCreated = await ensureNetwork(config.docker.network);

  logger.step("Restoring conventional binds into the working directory");
  await mkdir(config.paths.workingDir, { recursive: true });
  for (const bind of CONVENTIONAL_BINDS) {
    const source = path.join(layout.bindMountsDir, bind.archiveName);
    if (!existsSync(source)) {
      continue;
    }
    const destination = path.join(config.paths.workingDir, bind.relativePath);
    if (existsSync(destination)) {
      logger.info(`Keeping existing ${destination}`);
      continue;
    }
    if (bind.mode === "archive") {
      await extractTarball(source, config.paths.workingDir);
    } else {
      await cp(source, destination, { preserveTimestamps: true });
    }
    report.conventionalRestored.push(bind.archiveName);
  }

  if (options.absoluteBinds) {
    logger.step("Extracting host-path bind archives to /");
    const conventional = new Set(CONVENTIONAL_BINDS.map((b) => b.archiveName));
    for (const name of await listFiles(layout.bindMountsDir)) {
      if (conventional.has(name) || !name.endsWith(ARCHIVE_EXTENSION)) {
        continue;
      }
      try {
        await extractTarball(path.join(layout.bindMountsDir, name), "/", {
          elevate: config.bindMounts.elevate,
        });
        report.absoluteBindsRestored.push(name);
      } catch (error) {
        const message = errorMessage(error);
        logger.error(message);
        report.errors.push(message);
      }
    }
  }

  if (options.loadImages !== false && existsSync(layout.imagesArchive)) {
    logger.step("Loading saved images");
    try {
      await loadImages(layout.imagesArchive);
      report.imagesLoaded = true;
    } catch (error) {
      logger.warn(`Could not load images: ${errorMessage(error)}`);
    }
  }

  const start = options.start !== false;
  logger.step("Restoring compose files into ./stack");
  report.composeProjects = await restoreComposeProjects(config, layout, start);
  if (report.composeProjects.length === 0) {
    logger.info("No compose files in backup; start containers with your usual compose projects.");
  } else if (!report.composeProjects.some((p) => p.started)) {
    logger.info(
      `Manual startup required: run "docker compose up -d" in each directory under ${path.join(config.paths.workingDir, "stack")}`,
    );
  }

  const certificatePath = path.join(layout.certsDir, config.certs.fileName);
  if (existsSync(certificatePath)) {
    report.certificatePath = certificatePath;
    logger.info(`Proxy local root CA saved at: ${certificatePath} (re-trust it on your clients)`);
  }

  logger.step("Restore finished");
  return report;
}
