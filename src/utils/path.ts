/**
 * Path comparison and canonicalization
 */

import { statSync } from "node:fs";
import { realpath } from "node:fs/promises";
import * as path from "node:path";

/**
 * Check if a file path is within (or equal to) a directory.
 * Compares whole segments, so `/data/db2` is not within `/data/db`.
 */
export function isPathWithinDir(filePath: string, dir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(dir);

  if (normalizedPath === normalizedDir) {
    return true;
  }

  return normalizedPath.startsWith(ensureTrailingSep(normalizedDir));
}

/**
 * Ensure a path ends with a separator
 */
export function ensureTrailingSep(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : dirPath + path.sep;
}

/**
 * Absolute path with `..` segments and symbolic links resolved.
 * Rejects when the path does not exist.
 */
export async function canonicalPath(p: string): Promise<string> {
  return realpath(path.resolve(p));
}

/**
 * True when both paths name the same filesystem object (same device and inode),
 * which also covers bind mounts and hard links that string comparison misses.
 */
export function isSameLocation(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  const statA = statSync(a, { bigint: true });
  const statB = statSync(b, { bigint: true });
  return statA.dev === statB.dev && statA.ino === statB.ino;
}
