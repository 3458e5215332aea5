/**
 * Centralized type exports for hotbackup
 */

// Backup types
export type {
  BackupLayout,
  BackupOutcome,
  BackupResultDocument,
  ErrorDocument,
  ProgressSnapshot,
  RecordedError,
  SourceRoots,
  StatusDocument,
} from "./backup";
// Config types
export type {
  BackupSettings,
  EngineConfig,
  HotBackupConfig,
  LoggingConfig,
  StorageConfig,
} from "./config";
// Engine types
export type {
  BackupCallbacks,
  BackupEngine,
  EngineBinding,
  ErrorFunction,
  PollFunction,
} from "./engine";
