/**
 * Progress snapshot of one backup attempt
 */

import type { ProgressSnapshot } from "../../types";
import { SimpleMutex } from "../../utils/lock";
import { createLogger } from "../../utils/logger";
import { type ParsedProgress, parseProgressMessage } from "./progress-parser";

const log = createLogger("progress");

export const EMPTY_PROGRESS: Readonly<ProgressSnapshot> = Object.freeze({
  progress: 0,
  bytesDone: 0,
  filesDone: 0,
  filesTotal: 0,
  currentSource: "",
  currentDest: "",
  currentDone: 0,
  currentTotal: 0,
});

/**
 * - `updated`: the snapshot now reflects the message
 * - `ignored`: recognized, but carries nothing worth keeping
 * - `rejected`: not recognized; the snapshot is unchanged
 */
export type ProgressUpdate = "updated" | "ignored" | "rejected";

function nextSnapshot(
  previous: ProgressSnapshot,
  progress: number,
  parsed: Exclude<ParsedProgress, { kind: "listing-root" }>,
): ProgressSnapshot {
  // The engine reports the index of the file it is working on, which is not done yet.
  const filesDone = parsed.fileIndex - 1;

  if (parsed.kind === "listing") {
    return {
      progress,
      bytesDone: parsed.bytesDone,
      filesDone,
      filesTotal: parsed.fileIndex + parsed.filesRemaining,
      currentSource: parsed.source,
      currentDest: "",
      currentDone: 0,
      currentTotal: 0,
    };
  }

  return {
    ...previous,
    progress,
    bytesDone: parsed.bytesDone,
    filesDone,
    currentSource: parsed.source,
    currentDest: parsed.dest,
    currentDone: parsed.currentDone,
    currentTotal: parsed.currentTotal,
  };
}

export class ProgressTracker {
  private readonly lock = new SimpleMutex("backup progress");
  private state: ProgressSnapshot = { ...EMPTY_PROGRESS };

  /**
   * Apply one poll message. The whole field group is replaced inside a single
   * critical section, or not at all.
   */
  parse(progress: number, message: string): ProgressUpdate {
    if (!Number.isFinite(progress) || progress < 0 || progress > 1) {
      log.warn(`Unexpected backup progress fraction ${progress}: ${message}`);
      return "rejected";
    }

    const parsed = parseProgressMessage(message);
    if (parsed.kind === "unrecognized") {
      log.warn(`Unexpected backup poll message (${parsed.reason}): ${message}`);
      return "rejected";
    }
    if (parsed.kind === "listing-root") {
      return "ignored";
    }

    this.lock.withLock(() => {
      this.state = nextSnapshot(this.state, progress, parsed);
    });
    return "updated";
  }

  snapshot(): ProgressSnapshot {
    return this.lock.withLock(() => ({ ...this.state }));
  }

  reset(): void {
    this.lock.withLock(() => {
      this.state = { ...EMPTY_PROGRESS };
    });
  }
}
