/**
 * Errors raised by backup operations.
 *
 * Failures reported by the engine itself are not exceptions: they are recorded
 * by the controller and returned in the backup result.
 */

export class BackupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BackupError";
  }
}

/** Rejected argument, raised before the engine is touched. */
export class BackupValidationError extends BackupError {
  constructor(message: string) {
    super(message);
    this.name = "BackupValidationError";
  }
}

/** Destination layout could not be created. */
export class BackupFilesystemError extends BackupError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BackupFilesystemError";
  }
}

export class NoBackupRunningError extends BackupError {
  constructor() {
    super("no backup running");
    this.name = "NoBackupRunningError";
  }
}

export class BackupInProgressError extends BackupError {
  constructor() {
    super("this controller is already running a backup");
    this.name = "BackupInProgressError";
  }
}

export class EngineLoadError extends BackupError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EngineLoadError";
  }
}
