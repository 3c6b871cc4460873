/**
 * Image snapshot of running workloads
 */

import { writeFile } from "node:fs/promises";
import { listRunningImages } from "../../docker/container";
import { pullImage, saveImages } from "../../docker/image";
import type { BackupLayout } from "../../types";
import { logger } from "../../utils/logger";

export interface ImageSnapshot {
  images: string[];
  /** Path of images.tar, or null when nothing was running */
  archivePath: string | null;
  /** Images whose refresh pull failed */
  pullFailures: string[];
}

/**
 * Write running-images.txt and, when it is non-empty, save the images.
 * Pulls are best effort; a failed save is thrown.
 */
export async function snapshotImages(layout: BackupLayout): Promise<ImageSnapshot> {
  const images = await listRunningImages();
  await writeFile(layout.runningImagesFile, images.length > 0 ? `${images.join("\n")}\n` : "");

  if (images.length === 0) {
    logger.info("No running containers; skipping image save");
    return { images, archivePath: null, pullFailures: [] };
  }

  const pullFailures: string[] = [];
  for (const image of images) {
    if (!(await pullImage(image))) {
      pullFailures.push(image);
    }
  }

  logger.info(`Saving ${images.length} image(s) to ${layout.imagesArchive}`);
  await saveImages(layout.imagesArchive, images);

  return { images, archivePath: layout.imagesArchive, pullFailures };
}
