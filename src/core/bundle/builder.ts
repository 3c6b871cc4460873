/**
 * Packaging a backup into a distributable image
 */

import { existsSync } from "node:fs";
import { chmod, cp, mkdir, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { buildImage } from "../../docker/image";
import type { HomestashConfig, RunReport } from "../../types";
import { runCommand } from "../../utils/exec";
import { logger as rootLogger } from "../../utils/logger";
import { formatBackupId } from "../../utils/naming";
import { type BackupOptions, runBackup } from "../backup/orchestrator";
import { BundleError, errorMessage } from "../errors";
import { FALLBACK_RESTORE_SCRIPT, renderDockerfile, renderReadme } from "./templates";

const logger = rootLogger.child("bundle");

export const RESTORE_SCRIPT_NAME = "homelab-restore.sh";

export interface PackageOptions {
  /** Clock used for the image tag and build directory */
  now?: () => Date;
}

export interface PackageResult {
  imageTag: string;
  buildRoot: string;
  bundleDir: string;
  /** Whether the configured restore script was found (otherwise the fallback was written) */
  customRestoreScript: boolean;
}

export interface BundleResult {
  imageTag: string;
  buildRoot: string;
  backupDir: string;
  report: RunReport;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

function uniqueBuildRoot(buildDir: string, stamp: string): string {
  const base = path.join(buildDir, `homelab-image-build-${stamp}`);
  let candidate = base;
  for (let n = 2; existsSync(candidate); n++) {
    candidate = `${base}-${n}`;
  }
  return candidate;
}

/**
 * Hand the backup tree to its owner so an unprivileged build can read it
 */
export async function chownTree(owner: string, dir: string): Promise<void> {
  logger.info(`Handing ${dir} to ${owner}`);
  const result = await runCommand("chown", ["-R", owner, dir]);
  if (!result.success) {
    throw new BundleError(`Failed to chown ${dir} to ${owner}: ${result.stderr}`);
  }
}

/**
 * Build `<imageName>:<stamp>` from a backup directory
 */
export async function packageBackup(
  config: HomestashConfig,
  backupDir: string,
  options: PackageOptions = {},
): Promise<PackageResult> {
  if (!(await isDirectory(backupDir))) {
    throw new BundleError(`Backup folder not found: ${backupDir}`);
  }

  const created = (options.now ?? (() => new Date()))();
  const stamp = formatBackupId(created);
  const imageTag = `${config.bundle.imageName}:${stamp}`;
  const buildRoot = uniqueBuildRoot(config.bundle.buildDir, stamp);
  const bundleDir = path.join(buildRoot, "bundle");

  logger.step(`Preparing build context at: ${buildRoot}`);
  await mkdir(bundleDir, { recursive: true });
  await cp(backupDir, path.join(bundleDir, "backup"), {
    recursive: true,
    preserveTimestamps: true,
  });

  const scriptPath = path.join(bundleDir, RESTORE_SCRIPT_NAME);
  const customRestoreScript = existsSync(config.bundle.restoreScript);
  if (customRestoreScript) {
    await cp(config.bundle.restoreScript, scriptPath, { preserveTimestamps: true });
  } else {
    logger.info(`${config.bundle.restoreScript} not found; writing the minimal restore script`);
    await writeFile(scriptPath, FALLBACK_RESTORE_SCRIPT);
  }
  await chmod(scriptPath, 0o755);

  await writeFile(path.join(bundleDir, "README.txt"), renderReadme(imageTag));
  await writeFile(
    path.join(buildRoot, "Dockerfile"),
    renderDockerfile(config.bundle.baseImage, imageTag, created),
  );

  logger.step(`Building image: ${imageTag}`);
  try {
    await buildImage(buildRoot, imageTag);
  } catch (error) {
    throw new BundleError(errorMessage(error));
  }

  return { imageTag, buildRoot, bundleDir, customRestoreScript };
}

/**
 * Take a fresh backup and package it
 */
export async function runBundle(
  config: HomestashConfig,
  options: BackupOptions = {},
): Promise<BundleResult> {
  const report = await runBackup(config, options);
  if (!report.complete) {
    const failed = report.steps.filter((s) => s.status === "failed").map((s) => s.step);
    throw new BundleError(
      `Backup ${report.backupDir} is incomplete (failed: ${failed.join(", ")}); not bundling`,
    );
  }

  if (config.targetUser) {
    await chownTree(config.targetUser, config.paths.root);
  }

  const packaged = await packageBackup(config, report.backupDir, options);

  logger.info(`Done. Your backup image: ${packaged.imageTag}`);
  return {
    imageTag: packaged.imageTag,
    buildRoot: packaged.buildRoot,
    backupDir: report.backupDir,
    report,
  };
}
