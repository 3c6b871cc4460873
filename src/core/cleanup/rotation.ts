/**
 * LATEST pointer and retention window
 */

import { existsSync } from "node:fs";
import { readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { RotationResult } from "../../types";
import { logger } from "../../utils/logger";
import { isBackupId } from "../../utils/naming";

export const LATEST_FILE = "LATEST";

export interface BackupEntry {
  backupId: string;
  dir: string;
  mtimeMs: number;
}

export interface RotateOptions {
  dryRun?: boolean;
  /** Directory that must survive rotation regardless of its position */
  protect?: string;
}

/**
 * Point LATEST at a completed backup (one line, overwritten)
 */
export async function writeLatestPointer(root: string, backupDir: string): Promise<void> {
  await writeFile(path.join(root, LATEST_FILE), `${path.resolve(backupDir)}\n`);
}

/**
 * Directory named by LATEST, or null when there is none
 */
export async function readLatestPointer(root: string): Promise<string | null> {
  const latestPath = path.join(root, LATEST_FILE);
  if (!existsSync(latestPath)) {
    return null;
  }
  const target = (await readFile(latestPath, "utf-8")).trim();
  return target || null;
}

/** Timestamp part and same-second counter of a backup ID; the bare timestamp counts as 1 */
function splitBackupId(backupId: string): [string, number] {
  const match = /^(.*_\d{6})(?:-(\d+))?$/.exec(backupId);
  return match?.[1] ? [match[1], Number(match[2] ?? 1)] : [backupId, 1];
}

function compareBackupIds(a: string, b: string): number {
  const [baseA, counterA] = splitBackupId(a);
  const [baseB, counterB] = splitBackupId(b);
  if (baseA !== baseB) {
    return baseA < baseB ? -1 : 1;
  }
  return counterA - counterB;
}

/**
 * Backup directories under root, most recent first: modification time
 * descending, ties broken by backup ID descending (a "-10" run is newer than "-9")
 */
export async function listBackupDirs(root: string): Promise<BackupEntry[]> {
  if (!existsSync(root)) {
    return [];
  }

  const entries = await readdir(root, { withFileTypes: true });
  const backups: BackupEntry[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory() || !isBackupId(entry.name)) {
      continue;
    }
    const dir = path.join(root, entry.name);
    const { mtimeMs } = await stat(dir);
    backups.push({ backupId: entry.name, dir, mtimeMs });
  }

  return backups.sort((a, b) => b.mtimeMs - a.mtimeMs || compareBackupIds(b.backupId, a.backupId));
}

/**
 * Keep the `keep` most recent backup directories and delete the rest
 */
export async function rotateBackups(
  root: string,
  keep: number,
  options: RotateOptions = {},
): Promise<RotationResult> {
  const backups = await listBackupDirs(root);

  const protectedDir = options.protect ? path.resolve(options.protect) : null;
  const ordered = protectedDir
    ? [
        ...backups.filter((b) => b.dir === protectedDir),
        ...backups.filter((b) => b.dir !== protectedDir),
      ]
    : backups;

  const kept = ordered.slice(0, keep).map((b) => b.dir);
  const pruned = ordered.slice(keep).map((b) => b.dir);

  for (const dir of pruned) {
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would delete ${dir}`);
      continue;
    }
    logger.info(`Deleting old backup ${dir}`);
    await rm(dir, { recursive: true, force: true });
  }

  return { kept, pruned };
}

/**
 * Publish a completed backup as LATEST, then apply the retention window
 */
export async function finalizeBackup(
  root: string,
  backupDir: string,
  keep: number,
): Promise<RotationResult> {
  await writeLatestPointer(root, backupDir);
  return rotateBackups(root, keep, { protect: backupDir });
}
