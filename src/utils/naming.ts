/**
 * Backup identifiers and path-safe artifact names
 */

import * as path from "node:path";

// Pattern: YYYY-MM-DD_HHMMSS with an optional -N suffix when the second is already taken
export const BACKUP_ID_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{6}(?:-\d+)?$/;

export const ARCHIVE_EXTENSION = ".tar.gz";

function pad(n: number, width: number = 2): string {
  return n.toString().padStart(width, "0");
}

/**
 * Format a backup identifier from a local timestamp, e.g. "2025-08-12_224310"
 */
export function formatBackupId(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function isBackupId(name: string): boolean {
  return BACKUP_ID_PATTERN.test(name);
}

/**
 * Encode an absolute path as a flat file name: "/home/alice/app" -> "home__alice__app"
 */
export function encodeSourcePath(sourcePath: string): string {
  return path.resolve(sourcePath).replace(/^\/+/, "").split("/").join("__");
}

/**
 * Archive name for a bind-mounted source path (without collision handling)
 */
export function bindArchiveName(sourcePath: string): string {
  return `${encodeSourcePath(sourcePath)}${ARCHIVE_EXTENSION}`;
}

/**
 * Hands out artifact names for source paths within one run.
 *
 * The "__" encoding alone is not injective ("/a/b__c" and "/a/b/c" collide),
 * so a name already taken by a different source gets a ".2", ".3", ...
 * suffix before the extension. The same source always gets the same name.
 */
export class PathNameRegistry {
  private readonly sourceByName = new Map<string, string>();
  private readonly nameBySource = new Map<string, string>();

  constructor(private readonly extension: string = "") {}

  /**
   * Claim a fixed name for a source before any encoded name is handed out
   */
  reserve(name: string, sourcePath: string): void {
    const key = path.resolve(sourcePath);
    const owner = this.sourceByName.get(name);
    if (owner !== undefined && owner !== key) {
      throw new Error(`Artifact name "${name}" is already taken by ${owner}`);
    }
    this.sourceByName.set(name, key);
    this.nameBySource.set(key, name);
  }

  nameFor(sourcePath: string): string {
    const key = path.resolve(sourcePath);
    const existing = this.nameBySource.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const base = encodeSourcePath(key);
    let candidate = `${base}${this.extension}`;
    for (let n = 2; this.sourceByName.has(candidate); n++) {
      candidate = `${base}.${n}${this.extension}`;
    }

    this.sourceByName.set(candidate, key);
    this.nameBySource.set(key, candidate);
    return candidate;
  }

  hasSource(sourcePath: string): boolean {
    return this.nameBySource.has(path.resolve(sourcePath));
  }

  sourceOf(name: string): string | undefined {
    return this.sourceByName.get(name);
  }

  get size(): number {
    return this.sourceByName.size;
  }
}
