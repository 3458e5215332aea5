/**
 * Default configuration values
 */

import type { HotBackupConfig } from "../types";

export const DEFAULT_STATUS_INTERVAL_MS = 1000;

export const DEFAULT_CONFIG: Partial<HotBackupConfig> = {
  // version and storage are intentionally NOT defaulted - they must be specified by the user
  backup: {
    statusIntervalMs: DEFAULT_STATUS_INTERVAL_MS,
  },
  logging: {
    level: "info",
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source overriding target.
 * Arrays and scalars are replaced, undefined values are skipped.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}
