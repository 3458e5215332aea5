/**
 * Utility exports
 */

// Errno descriptions
export { describeErrno } from "./errno";
// Formatting utilities
export { formatBytes, formatDuration, formatPercent, formatRate } from "./format";
// Locks
export { LockError, SimpleMutex } from "./lock";
export type { LogLevel, ScopedLogger } from "./logger";
// Logger
export {
  createLogger,
  debug,
  error,
  getLogLevel,
  info,
  isLogLevel,
  LOG_LEVELS,
  logger,
  setLogLevel,
  warn,
} from "./logger";
// Path utilities
export { canonicalPath, ensureTrailingSep, isPathWithinDir, isSameLocation } from "./path";
