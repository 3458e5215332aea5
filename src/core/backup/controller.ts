/**
 * One hot backup attempt
 */

import { POLL_CANCEL, POLL_CONTINUE, PREPARING_BACKUP_PREFIX } from "../../engine/protocol";
import type {
  BackupCallbacks,
  BackupEngine,
  BackupLayout,
  BackupOutcome,
  BackupResultDocument,
  ProgressSnapshot,
  SourceRoots,
  StatusDocument,
} from "../../types";
import { formatPercent } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { canonicalPath, isSameLocation } from "../../utils/path";
import { BackupInProgressError, BackupValidationError } from "../errors";
import { renderStatus } from "./documents";
import { ErrorRecorder } from "./error-recorder";
import { ProgressTracker } from "./progress";
import { defaultRegistry, type ManagerRegistry, type ProgressSource } from "./registry";
import { planDestinations, prepareDestinations, resolveSourceDirs } from "./source-resolver";

const log = createLogger("backup");

export interface BackupControllerOptions {
  engine: BackupEngine;
  sources: SourceRoots;
  /** Defaults to the process-wide registry */
  registry?: ManagerRegistry;
  /** Checked on every poll; aborting it cancels the backup at the next poll */
  signal?: AbortSignal;
}

/**
 * Canonical source directories for the configured roots.
 */
export async function resolveCanonicalSources(roots: SourceRoots): Promise<string[]> {
  const data = await canonicalPath(roots.dataDir);
  const logDir = roots.logDir ? await canonicalPath(roots.logDir) : undefined;
  return resolveSourceDirs(data, logDir, isSameLocation);
}

/**
 * Source and destination directories a backup into `destination` would use.
 * Nothing is created.
 */
export async function resolveBackupLayout(
  roots: SourceRoots,
  destination: string,
): Promise<BackupLayout> {
  const sourceDirs = await resolveCanonicalSources(roots);
  return { sourceDirs, destDirs: planDestinations(sourceDirs.length, destination) };
}

function describeAbortReason(reason: unknown): string {
  if (typeof reason === "string" && reason !== "") {
    return reason;
  }
  if (reason instanceof Error && reason.message !== "") {
    return reason.message;
  }
  return "interrupted";
}

export class BackupController implements BackupCallbacks, ProgressSource {
  private readonly engine: BackupEngine;
  private readonly roots: SourceRoots;
  private readonly registry: ManagerRegistry;
  private readonly signal: AbortSignal | undefined;

  private readonly progress = new ProgressTracker();
  private readonly errors = new ErrorRecorder();
  private interruptReason: string | undefined;
  private claimed = false;
  private running = false;

  constructor(options: BackupControllerOptions) {
    this.engine = options.engine;
    this.roots = options.sources;
    this.registry = options.registry ?? defaultRegistry;
    this.signal = options.signal;
  }

  /**
   * Run the backup into `destination` and resolve once the engine returns.
   *
   * Engine failures do not reject: they come back with `ok: false` and the
   * engine's error in `result`. Rejects when the source roots cannot be
   * resolved or the destination subdirectories cannot be created.
   */
  async start(destination: string): Promise<BackupOutcome> {
    if (this.running) {
      throw new BackupInProgressError();
    }
    this.running = true;
    this.resetAttempt();

    try {
      const sourceDirs = await resolveCanonicalSources(this.roots);
      const destDirs = await prepareDestinations(sourceDirs.length, destination);

      log.debug(`Starting backup on ${destination}`, { sourceDirs, destDirs });
      const startTime = Date.now();
      const status = await this.engine.createBackup(sourceDirs, destDirs, this);
      const durationMs = Date.now() - startTime;

      const ok = status === 0;
      // A mismatch between status and recorded error is only reported.
      if (ok && !this.errors.isEmpty()) {
        log.warn("backup succeeded but reported an error", this.errors.get());
      } else if (!ok && this.errors.isEmpty()) {
        log.warn(`backup failed but didn't report an error (status ${status})`);
      }

      const result: BackupResultDocument = ok ? {} : this.errors.render();
      if (this.interruptReason !== undefined) {
        result.reason = this.interruptReason;
      }

      return { ok, result, sourceDirs, destDirs, durationMs };
    } finally {
      this.running = false;
    }
  }

  /**
   * Limit the engine's copy rate. Applies to whatever backup the engine is
   * running, including one started by another controller. 0 removes the limit.
   *
   * @throws BackupValidationError for a negative or non-numeric rate
   */
  throttle(bytesPerSecond: number): void {
    if (Number.isNaN(bytesPerSecond)) {
      throw new BackupValidationError("backupThrottle argument must be a number");
    }
    if (bytesPerSecond < 0) {
      throw new BackupValidationError("backupThrottle argument cannot be negative");
    }
    if (!Number.isFinite(bytesPerSecond)) {
      throw new BackupValidationError("backupThrottle argument must be finite");
    }
    log.debug(`Throttling backup to ${bytesPerSecond}`);
    this.engine.throttleBackup(bytesPerSecond);
  }

  /**
   * Status of the active backup, which is not necessarily this one.
   *
   * @throws NoBackupRunningError
   */
  status(): StatusDocument {
    return renderStatus(this.registry.currentSnapshot());
  }

  readProgress(): ProgressSnapshot {
    return this.progress.snapshot();
  }

  /** Poll callback. Bound so the engine may call it detached. */
  readonly onProgress = (progress: number, message: string): number => {
    if (this.signal?.aborted) {
      this.interruptReason = describeAbortReason(this.signal.reason);
      return POLL_CANCEL;
    }

    if (message.startsWith(PREPARING_BACKUP_PREFIX)) {
      if (!this.claimed) {
        this.claimed = true;
        this.registry.tryClaim(this);
      }
      return POLL_CONTINUE;
    }

    log.debug(`Backup progress ${formatPercent(progress)}`);
    log.debug(message);
    this.progress.parse(progress, message);
    return POLL_CONTINUE;
  };

  /** Error callback. Bound so the engine may call it detached. */
  readonly onError = (code: number, message: string): void => {
    log.error(`backup error ${code}: ${message}`);
    if (!this.errors.record(code, message)) {
      log.debug("an earlier error is already recorded for this backup; keeping it");
    }
  };

  /**
   * Release the registry slot if this controller still holds it. Call once the
   * attempt is finished or abandoned.
   */
  dispose(): void {
    this.registry.releaseIfOwner(this);
  }

  private resetAttempt(): void {
    this.progress.reset();
    this.errors.reset();
    this.interruptReason = undefined;
    this.claimed = false;
  }
}
