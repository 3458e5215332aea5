/**
 * Configuration validation
 */

import type { HotBackupConfig } from "../types";
import { isLogLevel, LOG_LEVELS } from "../utils/logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  storage: (c) => {
    if (!isRecord(c.storage)) {
      throw new ConfigError("Config must have a 'storage' section");
    }
    if (!isNonEmptyString(c.storage.dataDir)) {
      throw new ConfigError("storage.dataDir must be a string");
    }
    if (c.storage.logDir !== undefined && typeof c.storage.logDir !== "string") {
      throw new ConfigError("storage.logDir must be a string");
    }
  },

  engine: (c) => {
    if (c.engine === undefined) {
      return; // Only needed to actually run a backup
    }
    if (!isRecord(c.engine)) {
      throw new ConfigError("engine must be an object");
    }
    if (!isNonEmptyString(c.engine.module)) {
      throw new ConfigError("engine.module must be a string");
    }
  },

  backup: (c) => {
    if (c.backup === undefined) {
      return;
    }
    if (!isRecord(c.backup)) {
      throw new ConfigError("backup must be an object");
    }
    const { throttle, statusIntervalMs } = c.backup;
    if (
      throttle !== undefined &&
      (typeof throttle !== "number" || !Number.isFinite(throttle) || throttle < 0)
    ) {
      throw new ConfigError("backup.throttle must be a non-negative number of bytes per second");
    }
    if (
      statusIntervalMs !== undefined &&
      (typeof statusIntervalMs !== "number" ||
        !Number.isInteger(statusIntervalMs) ||
        statusIntervalMs <= 0)
    ) {
      throw new ConfigError("backup.statusIntervalMs must be a positive integer");
    }
  },

  logging: (c) => {
    if (c.logging === undefined) {
      return;
    }
    if (!isRecord(c.logging)) {
      throw new ConfigError("logging must be an object");
    }
    if (c.logging.level !== undefined && !isLogLevel(c.logging.level)) {
      throw new ConfigError(`logging.level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
  },
};

export function validateConfig(config: unknown): asserts config is HotBackupConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
