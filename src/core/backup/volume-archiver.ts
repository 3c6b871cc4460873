/**
 * Named volume export and re-import through short-lived helper containers
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import { ensureImage, runContainer } from "../../docker/client";
import { createVolume, listVolumes } from "../../docker/volume";
import type { HomestashConfig, VolumeArchiveResult } from "../../types";
import { logger } from "../../utils/logger";
import { ARCHIVE_EXTENSION } from "../../utils/naming";
import { describeRejection, mapWithConcurrency } from "../../utils/pool";

export interface VolumeArchiveReport {
  archived: VolumeArchiveResult[];
  errors: string[];
}

function archiveFileName(volumeName: string): string {
  return `${volumeName}${ARCHIVE_EXTENSION}`;
}

async function requireHelperImage(image: string): Promise<void> {
  if (!(await ensureImage(image))) {
    throw new Error(`Helper image ${image} is not available and could not be pulled`);
  }
}

/**
 * Export one volume to `<volumesDir>/<volume>.tar.gz`, holding the volume root
 */
export async function archiveVolume(
  helperImage: string,
  volumeName: string,
  volumesDir: string,
): Promise<VolumeArchiveResult> {
  const fileName = archiveFileName(volumeName);
  logger.info(`  -> ${volumeName}`);

  const result = await runContainer({
    image: helperImage,
    volumes: [
      { source: volumeName, target: "/source", readonly: true },
      { source: volumesDir, target: "/backup" },
    ],
    command: ["tar", "-czf", `/backup/${fileName}`, "-C", "/source", "."],
  });

  if (!result.success) {
    throw new Error(`Failed to archive volume ${volumeName}: ${result.stderr || `exit code ${result.exitCode}`}`);
  }

  const archivePath = path.join(volumesDir, fileName);
  const { size } = await stat(archivePath);
  return { volumeName, archivePath, sizeBytes: size };
}

/**
 * Export every named volume. Per-volume failures are collected, a failure to
 * list volumes or obtain the helper image is thrown.
 */
export async function archiveVolumes(
  config: HomestashConfig,
  volumesDir: string,
): Promise<VolumeArchiveReport> {
  const volumes = await listVolumes();
  if (volumes.length === 0) {
    logger.info("No named volumes found");
    return { archived: [], errors: [] };
  }

  await requireHelperImage(config.docker.helperImage);

  const settled = await mapWithConcurrency(volumes, config.concurrency, (volume) =>
    archiveVolume(config.docker.helperImage, volume.name, volumesDir),
  );

  const report: VolumeArchiveReport = { archived: [], errors: [] };
  for (const outcome of settled) {
    if (outcome.status === "fulfilled") {
      report.archived.push(outcome.value);
    } else {
      const message = describeRejection(outcome.reason);
      logger.error(message);
      report.errors.push(message);
    }
  }

  return report;
}

/**
 * "pihole_data.tar.gz" -> "pihole_data"; null for anything else
 */
export function volumeNameFromArchive(fileName: string): string | null {
  return fileName.endsWith(ARCHIVE_EXTENSION) && fileName.length > ARCHIVE_EXTENSION.length
    ? fileName.slice(0, -ARCHIVE_EXTENSION.length)
    : null;
}

/**
 * Create the volume (if missing) and extract its archive into it
 */
export async function restoreVolume(
  helperImage: string,
  volumeName: string,
  volumesDir: string,
): Promise<void> {
  logger.info(`  -> ${volumeName}`);
  await createVolume(volumeName);

  const result = await runContainer({
    image: helperImage,
    volumes: [
      { source: volumeName, target: "/target" },
      { source: volumesDir, target: "/backup" },
    ],
    command: ["tar", "-xzf", `/backup/${archiveFileName(volumeName)}`, "-C", "/target"],
  });

  if (!result.success) {
    throw new Error(`Failed to restore volume ${volumeName}: ${result.stderr || `exit code ${result.exitCode}`}`);
  }
}

export async function restoreVolumes(
  config: HomestashConfig,
  volumeNames: string[],
  volumesDir: string,
): Promise<{ restored: string[]; errors: string[] }> {
  if (volumeNames.length === 0) {
    return { restored: [], errors: [] };
  }

  await requireHelperImage(config.docker.helperImage);

  const settled = await mapWithConcurrency(volumeNames, config.concurrency, (name) =>
    restoreVolume(config.docker.helperImage, name, volumesDir),
  );

  const restored: string[] = [];
  const errors: string[] = [];
  settled.forEach((outcome, index) => {
    const name = volumeNames[index];
    if (outcome.status === "rejected") {
      const message = describeRejection(outcome.reason);
      logger.error(message);
      errors.push(message);
    } else if (name !== undefined) {
      restored.push(name);
    }
  });

  return { restored, errors };
}
