/**
 * Source and destination directory layout
 */

import { mkdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { isPathWithinDir } from "../../utils/path";
import { BackupFilesystemError } from "../errors";

export type SameLocation = (a: string, b: string) => boolean;

/** Subdirectories of the destination used when data and log roots are backed up separately */
export const DATA_SUBDIR = "data";
export const LOG_SUBDIR = "log";

/**
 * Minimal set of source directories covering the data root and the optional
 * log root. Both must already be canonical absolute paths.
 *
 * When one root contains the other only the containing one is returned.
 * Otherwise the data root always comes first.
 */
export function resolveSourceDirs(
  primary: string,
  secondary?: string,
  sameLocation: SameLocation = (a, b) => a === b,
): string[] {
  if (!secondary || sameLocation(primary, secondary)) {
    return [primary];
  }

  if (primary.length <= secondary.length) {
    if (isPathWithinDir(secondary, primary)) {
      return [primary];
    }
  } else if (isPathWithinDir(primary, secondary)) {
    // Data root inside the log root is unusual, but handled the same way.
    return [secondary];
  }

  return [primary, secondary];
}

/**
 * Destination directory for each source, without touching the filesystem.
 */
export function planDestinations(sourceCount: number, destRoot: string): string[] {
  if (sourceCount === 1) {
    return [destRoot];
  }
  if (sourceCount === 2) {
    return [path.join(destRoot, DATA_SUBDIR), path.join(destRoot, LOG_SUBDIR)];
  }
  throw new RangeError(`Expected 1 or 2 source directories, got ${sourceCount}`);
}

async function createDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      if ((await stat(dir)).isDirectory()) {
        return;
      }
    }
    throw error;
  }
}

/**
 * Plan the destinations and create the per-source subdirectories when there
 * are two sources. A failure aborts the backup; a subdirectory created before
 * the failure is left in place.
 */
export async function prepareDestinations(
  sourceCount: number,
  destRoot: string,
): Promise<string[]> {
  const dests = planDestinations(sourceCount, destRoot);
  if (dests.length === 1) {
    return dests;
  }

  try {
    for (const dir of dests) {
      await createDirectory(dir);
    }
  } catch (error) {
    throw new BackupFilesystemError("Hot backup could not create backup subdirectories", {
      cause: error,
    });
  }

  return dests;
}
