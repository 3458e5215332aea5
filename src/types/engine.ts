/**
 * Backup engine contract
 */

/**
 * What the engine calls back into while a backup runs.
 */
export interface BackupCallbacks {
  /** Return a negative number to request cancellation. */
  onProgress(progress: number, message: string): number;
  onError(code: number, message: string): void;
}

/**
 * A backup engine: copies the source directories into the destination
 * directories and reports through the callbacks. Resolves with 0 on success.
 */
export interface BackupEngine {
  createBackup(
    sourceDirs: readonly string[],
    destDirs: readonly string[],
    callbacks: BackupCallbacks,
  ): Promise<number>;
  /** Applies to the backup in progress, if any. 0 means unlimited. */
  throttleBackup(bytesPerSecond: number): void;
}

export type PollFunction = (progress: number, message: string, pollExtra: unknown) => number;

export type ErrorFunction = (code: number, message: string, errorExtra: unknown) => void;

/**
 * Native-style binding: plain callback functions plus an opaque context value
 * handed back on every call.
 */
export interface EngineBinding {
  createBackup(
    sourceDirs: readonly string[],
    destDirs: readonly string[],
    dirCount: number,
    pollFn: PollFunction,
    pollExtra: unknown,
    errorFn: ErrorFunction,
    errorExtra: unknown,
  ): number | Promise<number>;
  throttleBackup(bytesPerSecond: number): void;
}
