/**
 * Configuration type definitions for hotbackup
 */

import type { LogLevel } from "../utils/logger";

export interface StorageConfig {
  /** Database data directory, always backed up */
  dataDir: string;
  /** Separate journal/log directory, if the server uses one */
  logDir?: string;
}

export interface EngineConfig {
  /** Module exporting the backup engine (`engine`/default) or a native-style `binding` */
  module: string;
}

export interface BackupSettings {
  /** Bytes per second applied before the backup starts; 0 means unlimited */
  throttle?: number;
  /** How often the CLI refreshes the progress line */
  statusIntervalMs?: number;
}

export interface LoggingConfig {
  level?: LogLevel;
}

export interface HotBackupConfig {
  version: string;
  storage: StorageConfig;
  engine?: EngineConfig;
  backup?: BackupSettings;
  logging?: LoggingConfig;
}
