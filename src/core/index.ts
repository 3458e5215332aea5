/**
 * Core module exports
 */

// Backup
export {
  BackupController,
  type BackupControllerOptions,
  type ClaimResult,
  defaultRegistry,
  ErrorRecorder,
  ManagerRegistry,
  type ParsedProgress,
  type ProgressSource,
  ProgressTracker,
  type ProgressUpdate,
  parseProgressMessage,
  planDestinations,
  prepareDestinations,
  renderStatus,
  resolveBackupLayout,
  resolveCanonicalSources,
  resolveSourceDirs,
} from "./backup";

// Errors
export {
  BackupError,
  BackupFilesystemError,
  BackupInProgressError,
  BackupValidationError,
  EngineLoadError,
  NoBackupRunningError,
} from "./errors";

// Engine boundary
export {
  BindingEngine,
  engineFromModule,
  loadEngine,
  POLL_CANCEL,
  POLL_CONTINUE,
} from "../engine";

export type * from "../types";
