/**
 * Inline configuration parsing and merging utilities
 */

import * as path from "node:path";
import type { HotBackupConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { ConfigError, validateConfig } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Database data directory */
  dataDir?: string;
  /** Separate log directory */
  logDir?: string;
  /** Backup engine module */
  engine?: string;
  /** Bytes per second, 0 for unlimited */
  throttle?: number;
}

export interface InlineValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * `parseArgs` option definitions for the inline config flags
 */
export const INLINE_CONFIG_OPTIONS = {
  "data-dir": { type: "string" },
  "log-dir": { type: "string" },
  engine: { type: "string" },
  throttle: { type: "string" },
} as const;

function parseThrottle(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`--throttle must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

/**
 * Pick the inline config flags out of parsed CLI values. Paths are resolved
 * against the working directory.
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  const options: InlineConfigOptions = {};
  const dataDir = values["data-dir"];
  const logDir = values["log-dir"];
  const engine = values.engine;
  const throttle = values.throttle;

  if (typeof dataDir === "string") {
    options.dataDir = path.resolve(dataDir);
  }
  if (typeof logDir === "string") {
    options.logDir = path.resolve(logDir);
  }
  if (typeof engine === "string") {
    options.engine = path.resolve(engine);
  }
  if (typeof throttle === "string") {
    options.throttle = parseThrottle(throttle);
  }

  return options;
}

export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}

export function validateInlineOptionsForConfigFreeMode(
  options: InlineConfigOptions,
): InlineValidationResult {
  const errors: string[] = [];
  if (!options.dataDir) {
    errors.push("--data-dir is required when no config file is used");
  }
  return { valid: errors.length === 0, errors };
}

export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return validateInlineOptionsForConfigFreeMode(options).valid;
}

function toPartialConfig(options: InlineConfigOptions): Record<string, unknown> {
  const partial: Record<string, unknown> = {};
  if (options.dataDir !== undefined || options.logDir !== undefined) {
    partial.storage = { dataDir: options.dataDir, logDir: options.logDir };
  }
  if (options.engine !== undefined) {
    partial.engine = { module: options.engine };
  }
  if (options.throttle !== undefined) {
    partial.backup = { throttle: options.throttle };
  }
  return partial;
}

/**
 * Build a complete config from inline options alone
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): HotBackupConfig {
  const validation = validateInlineOptionsForConfigFreeMode(options);
  if (!validation.valid) {
    throw new ConfigError(validation.errors.join("; "));
  }

  const config = deepMerge({ ...DEFAULT_CONFIG, version: "1" }, toPartialConfig(options));
  validateConfig(config);
  return config;
}

/**
 * Apply inline options on top of a loaded config; inline values win
 */
export function mergeInlineConfig(
  config: HotBackupConfig,
  options: InlineConfigOptions,
): HotBackupConfig {
  const merged = deepMerge({ ...config }, toPartialConfig(options));
  validateConfig(merged);
  return merged;
}
