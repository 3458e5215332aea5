/**
 * Process-wide record of the backup that is currently running
 */

import type { ProgressSnapshot } from "../../types";
import { SimpleMutex } from "../../utils/lock";
import { createLogger } from "../../utils/logger";
import { NoBackupRunningError } from "../errors";

const log = createLogger("registry");

/**
 * Anything the registry can report progress for.
 */
export interface ProgressSource {
  readProgress(): ProgressSnapshot;
}

/**
 * - `claimed`: the slot was empty, or already held by the candidate
 * - `replaced`: another holder was overwritten
 */
export type ClaimResult = "claimed" | "replaced";

/**
 * Single slot holding a weak reference to the active backup. The slot never
 * keeps a finished controller alive; one that has been collected reads as
 * an empty slot.
 *
 * All slot access goes through the registry lock. A holder's own progress
 * lock is never taken while the registry lock is held.
 */
export class ManagerRegistry<T extends ProgressSource = ProgressSource> {
  private readonly lock = new SimpleMutex("backup registry");
  private slot: WeakRef<T> | undefined;

  /**
   * Record `candidate` as the active backup. An existing holder is overwritten
   * rather than refused: when backups run back to back, the previous one may
   * have finished without having released the slot yet.
   */
  tryClaim(candidate: T): ClaimResult {
    return this.lock.withLock(() => {
      const holder = this.slot?.deref();
      this.slot = new WeakRef(candidate);
      if (holder !== undefined && holder !== candidate) {
        log.debug(
          "A different backup is still registered while a new one is being polled. " +
            "This should only happen if backups are run in quick succession.",
        );
        return "replaced";
      }
      return "claimed";
    });
  }

  /**
   * Clear the slot, but only if `candidate` still holds it; a newer backup
   * may have claimed it since.
   */
  releaseIfOwner(candidate: T): boolean {
    return this.lock.withLock(() => {
      if (this.slot?.deref() !== candidate) {
        return false;
      }
      this.slot = undefined;
      return true;
    });
  }

  current(): T | undefined {
    return this.lock.withLock(() => this.slot?.deref());
  }

  /**
   * @throws NoBackupRunningError when no backup holds the slot
   */
  currentSnapshot(): ProgressSnapshot {
    const holder = this.current();
    if (holder === undefined) {
      throw new NoBackupRunningError();
    }
    return holder.readProgress();
  }
}

/** The registry shared by every controller that is not given its own. */
export const defaultRegistry = new ManagerRegistry();
