/**
 * Summaries of the backups under a root
 */

import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { ARCHIVE_EXTENSION } from "../../utils/naming";
import { describeLayout } from "../backup/layout";
import { listBackupDirs, readLatestPointer } from "../cleanup/rotation";

export interface BackupSummary {
  backupId: string;
  dir: string;
  modifiedAt: Date;
  volumes: number;
  bindMounts: number;
  composeFiles: number;
  hasImages: boolean;
  sizeBytes: number;
  /** Named by LATEST */
  latest: boolean;
}

async function countEntries(dir: string, filter: (name: string) => boolean = () => true): Promise<number> {
  if (!existsSync(dir)) {
    return 0;
  }
  return (await readdir(dir)).filter(filter).length;
}

async function treeSize(dir: string): Promise<number> {
  const entries = await fg("**/*", { cwd: dir, dot: true, onlyFiles: true, stats: true });
  return entries.reduce((sum, entry) => sum + (entry.stats?.size ?? 0), 0);
}

/**
 * Backups under root, most recent first
 */
export async function listBackups(root: string): Promise<BackupSummary[]> {
  const latest = await readLatestPointer(root);
  const summaries: BackupSummary[] = [];

  for (const entry of await listBackupDirs(root)) {
    const layout = describeLayout(entry.dir);
    summaries.push({
      backupId: entry.backupId,
      dir: entry.dir,
      modifiedAt: new Date(entry.mtimeMs),
      volumes: await countEntries(layout.volumesDir, (n) => n.endsWith(ARCHIVE_EXTENSION)),
      bindMounts: await countEntries(layout.bindMountsDir),
      composeFiles: await countEntries(layout.composeDir),
      hasImages: existsSync(layout.imagesArchive),
      sizeBytes: await treeSize(entry.dir),
      latest: latest !== null && path.resolve(latest) === entry.dir,
    });
  }

  return summaries;
}
