/**
 * Backup module exports
 */

export {
  BackupController,
  type BackupControllerOptions,
  resolveBackupLayout,
  resolveCanonicalSources,
} from "./controller";
export { renderStatus, toPercent } from "./documents";
export { ErrorRecorder } from "./error-recorder";
export { EMPTY_PROGRESS, ProgressTracker, type ProgressUpdate } from "./progress";
export {
  type CopyProgress,
  type ListingProgress,
  type ParsedProgress,
  type ProgressParseFailure,
  type ProgressParseResult,
  parseProgressMessage,
  type RootListingProgress,
} from "./progress-parser";
export {
  type ClaimResult,
  defaultRegistry,
  ManagerRegistry,
  type ProgressSource,
} from "./registry";
export {
  DATA_SUBDIR,
  LOG_SUBDIR,
  planDestinations,
  prepareDestinations,
  resolveSourceDirs,
  type SameLocation,
} from "./source-resolver";
