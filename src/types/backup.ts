/**
 * Backup operation type definitions
 */

/**
 * Latest progress reported by the engine for one backup attempt.
 */
export interface ProgressSnapshot {
  /** Fraction complete, 0 to 1 */
  progress: number;
  bytesDone: number;
  /** Files fully copied (the engine's current file index minus one) */
  filesDone: number;
  filesTotal: number;
  /** Empty until the engine names a file */
  currentSource: string;
  /** Empty while the engine is only listing files */
  currentDest: string;
  currentDone: number;
  currentTotal: number;
}

export interface RecordedError {
  code: number;
  message: string;
}

/**
 * Source roots as configured. `logDir` is optional and may coincide with,
 * or live inside, `dataDir`.
 */
export interface SourceRoots {
  dataDir: string;
  logDir?: string;
}

export interface BackupLayout {
  /** One or two canonical source directories, data root first */
  sourceDirs: string[];
  /** Destination directory for each source, same order */
  destDirs: string[];
}

export interface StatusDocument {
  percent: number;
  bytesDone: number;
  files: {
    done: number;
    total: number;
  };
  current?: {
    source: string;
    dest?: string;
    bytes?: {
      done: number;
      total: number;
    };
  };
}

export interface ErrorDocument {
  message: string;
  errno: number;
  strerror: string;
}

export interface BackupResultDocument extends Partial<ErrorDocument> {
  /** Why the attempt was interrupted, when it was */
  reason?: string;
}

export interface BackupOutcome extends BackupLayout {
  ok: boolean;
  result: BackupResultDocument;
  durationMs: number;
}
