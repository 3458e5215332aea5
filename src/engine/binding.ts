/**
 * Adapter from a native-style engine binding to `BackupEngine`
 */

import type {
  BackupCallbacks,
  BackupEngine,
  EngineBinding,
  ErrorFunction,
  PollFunction,
} from "../types";
import { POLL_CANCEL } from "./protocol";

function isBackupCallbacks(value: unknown): value is BackupCallbacks {
  return (
    typeof value === "object" &&
    value !== null &&
    "onProgress" in value &&
    typeof value.onProgress === "function" &&
    "onError" in value &&
    typeof value.onError === "function"
  );
}

/**
 * Poll trampoline: the binding hands back the callbacks object as its opaque
 * context. An unusable context cancels the backup instead of crashing inside
 * the engine.
 */
export const pollTrampoline: PollFunction = (progress, message, pollExtra) => {
  if (!isBackupCallbacks(pollExtra)) {
    return POLL_CANCEL;
  }
  return pollExtra.onProgress(progress, message);
};

export const errorTrampoline: ErrorFunction = (code, message, errorExtra) => {
  if (!isBackupCallbacks(errorExtra)) {
    throw new TypeError(`backup error ${code} reported without a callback context: ${message}`);
  }
  errorExtra.onError(code, message);
};

export class BindingEngine implements BackupEngine {
  constructor(private readonly binding: EngineBinding) {}

  async createBackup(
    sourceDirs: readonly string[],
    destDirs: readonly string[],
    callbacks: BackupCallbacks,
  ): Promise<number> {
    if (sourceDirs.length !== destDirs.length) {
      throw new RangeError(
        `Got ${sourceDirs.length} source directories but ${destDirs.length} destinations`,
      );
    }
    return this.binding.createBackup(
      sourceDirs,
      destDirs,
      sourceDirs.length,
      pollTrampoline,
      callbacks,
      errorTrampoline,
      callbacks,
    );
  }

  throttleBackup(bytesPerSecond: number): void {
    this.binding.throttleBackup(bytesPerSecond);
  }
}
