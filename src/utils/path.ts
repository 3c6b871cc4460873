/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory (or is the directory itself).
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(ensureTrailingSep(normalizedDir)) || normalizedPath === normalizedDir;
}

/**
 * Check if a file path lies strictly below a directory (the directory itself does not count).
 */
export function isPathUnderDir(filePath: string, dir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(dir);

  return normalizedPath !== normalizedDir && normalizedPath.startsWith(ensureTrailingSep(normalizedDir));
}

/**
 * Ensure a path ends with a separator
 */
export function ensureTrailingSep(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : dirPath + path.sep;
}

/**
 * Expand a leading "~" to the given home directory
 */
export function expandHome(p: string, home: string): string {
  if (p === "~") {
    return home;
  }
  if (p.startsWith("~/")) {
    return path.join(home, p.slice(2));
  }
  return p;
}

/**
 * Resolve a configured path: "~" expands to home, relative paths resolve against baseDir.
 */
export function resolveConfigPath(p: string, home: string, baseDir: string): string {
  const expanded = expandHome(p, home);
  return path.isAbsolute(expanded) ? path.normalize(expanded) : path.resolve(baseDir, expanded);
}

/**
 * Path of an absolute path relative to the filesystem root ("/a/b" -> "a/b")
 */
export function stripRoot(absolutePath: string): string {
  return path.resolve(absolutePath).replace(/^\/+/, "");
}
