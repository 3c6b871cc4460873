/**
 * Backup directory layout
 */

import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import type { BackupLayout } from "../../types";
import { formatBackupId } from "../../utils/naming";

export const SUBDIRECTORIES = {
  volumes: "volumes",
  manifests: "manifests",
  certs: "certs",
  bindMounts: "bind-mounts",
  compose: "compose-files",
} as const;

export const RUNNING_IMAGES_FILE = "running-images.txt";
export const IMAGES_ARCHIVE = "images.tar";

/**
 * Describe the layout of a backup directory without touching the disk
 */
export function describeLayout(dir: string): BackupLayout {
  const absolute = path.resolve(dir);
  return {
    backupId: path.basename(absolute),
    dir: absolute,
    volumesDir: path.join(absolute, SUBDIRECTORIES.volumes),
    manifestsDir: path.join(absolute, SUBDIRECTORIES.manifests),
    certsDir: path.join(absolute, SUBDIRECTORIES.certs),
    bindMountsDir: path.join(absolute, SUBDIRECTORIES.bindMounts),
    composeDir: path.join(absolute, SUBDIRECTORIES.compose),
    runningImagesFile: path.join(absolute, RUNNING_IMAGES_FILE),
    imagesArchive: path.join(absolute, IMAGES_ARCHIVE),
  };
}

/**
 * Pick an identifier for a run started at `now` that no directory under
 * `root` uses yet: the timestamp itself, then "-2", "-3", ...
 */
export function uniqueBackupId(root: string, now: Date): string {
  const base = formatBackupId(now);
  let candidate = base;
  for (let n = 2; existsSync(path.join(root, candidate)); n++) {
    candidate = `${base}-${n}`;
  }
  return candidate;
}

/**
 * Create a fresh backup directory and its subdirectories under `root`
 */
export async function createBackupLayout(root: string, now: Date): Promise<BackupLayout> {
  await mkdir(root, { recursive: true });

  const layout = describeLayout(path.join(root, uniqueBackupId(root, now)));
  // Non-recursive so a directory appearing between the check and here is an error
  await mkdir(layout.dir);

  for (const dir of [
    layout.volumesDir,
    layout.manifestsDir,
    layout.certsDir,
    layout.bindMountsDir,
    layout.composeDir,
  ]) {
    await mkdir(dir, { recursive: true });
  }

  return layout;
}
