/**
 * Grammar of the engine's poll messages.
 *
 * Every message starts with a common header and continues with one of three
 * variants, probed in this order:
 *
 *   Backup progress 475607 bytes, 13 files.  4 more files known of. Copying file /data/db/foo
 *   Backup progress 442839 bytes, 10 files.  Throttled: copied 4096/32768 bytes of /data/db/a to /backup/a. Sleeping 0.25s for throttling.
 *   Backup progress 442839 bytes, 10 files.  Copying file: 0/32768 bytes done of /data/db/a to /backup/a.
 *
 * The wording belongs to the engine and may drift between versions, so a
 * message is either matched completely or rejected completely.
 */

const HEADER = /^Backup progress (\d+) bytes, (\d+) files\.\s*(.*)$/s;

const LISTING_PROBE = "more files known of";
const LISTING = /^(\d+) more files known of\. Copying file\s*(\S.*)$/s;

const THROTTLED_PROBE = "Throttled: copied";
const THROTTLED =
  /^Throttled: copied (\d+)\/(\d+) bytes of\s*(.+?) to (.+)\. Sleeping\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)s for throttling\.$/s;

const COPYING = /^Copying file: (\d+)\/(\d+) bytes done of\s*(.+?) to (.+)\.$/s;

/** Placeholder the engine reports while it lists the root directory itself */
const ROOT_PLACEHOLDER = ".";

interface ProgressHeader {
  bytesDone: number;
  /** Index of the file being copied; that file is not finished yet */
  fileIndex: number;
}

export interface ListingProgress extends ProgressHeader {
  kind: "listing";
  filesRemaining: number;
  source: string;
}

export interface RootListingProgress extends ProgressHeader {
  kind: "listing-root";
}

export interface CopyProgress extends ProgressHeader {
  kind: "copying" | "throttled";
  currentDone: number;
  currentTotal: number;
  source: string;
  dest: string;
  /** Only set for throttled copies */
  sleepSeconds?: number;
}

export interface ProgressParseFailure {
  kind: "unrecognized";
  reason: string;
}

export type ParsedProgress = ListingProgress | RootListingProgress | CopyProgress;

export type ProgressParseResult = ParsedProgress | ProgressParseFailure;

function unrecognized(reason: string): ProgressParseFailure {
  return { kind: "unrecognized", reason };
}

function toCount(digits: string | undefined): number | undefined {
  if (digits === undefined) {
    return undefined;
  }
  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : undefined;
}

function parseListing(header: ProgressHeader, rest: string): ProgressParseResult {
  const match = LISTING.exec(rest);
  const filesRemaining = toCount(match?.[1]);
  const source = match?.[2];
  if (filesRemaining === undefined || source === undefined) {
    return unrecognized("malformed file listing");
  }
  if (source === ROOT_PLACEHOLDER) {
    return { kind: "listing-root", ...header };
  }
  return { kind: "listing", ...header, filesRemaining, source };
}

function parseCopy(
  kind: CopyProgress["kind"],
  header: ProgressHeader,
  rest: string,
): ProgressParseResult {
  const malformed = `malformed ${kind === "throttled" ? "throttled copy" : "file copy"}`;
  const match = (kind === "throttled" ? THROTTLED : COPYING).exec(rest);
  const source = match?.[3];
  const dest = match?.[4];
  if (!match || source === undefined || dest === undefined) {
    return unrecognized(malformed);
  }
  const currentDone = toCount(match[1]);
  const currentTotal = toCount(match[2]);
  if (currentDone === undefined || currentTotal === undefined) {
    return unrecognized("byte counts out of range");
  }

  const parsed: CopyProgress = { kind, ...header, currentDone, currentTotal, source, dest };
  if (kind === "throttled") {
    const sleepSeconds = Number(match[5]);
    if (!Number.isFinite(sleepSeconds)) {
      return unrecognized("malformed throttle sleep time");
    }
    parsed.sleepSeconds = sleepSeconds;
  }
  return parsed;
}

export function parseProgressMessage(message: string): ProgressParseResult {
  const header = HEADER.exec(message);
  if (!header) {
    return unrecognized("missing progress header");
  }
  const bytesDone = toCount(header[1]);
  const fileIndex = toCount(header[2]);
  if (bytesDone === undefined || fileIndex === undefined) {
    return unrecognized("progress counts out of range");
  }
  const rest = header[3] ?? "";

  const counts: ProgressHeader = { bytesDone, fileIndex };

  if (rest.includes(LISTING_PROBE)) {
    return parseListing(counts, rest);
  }
  if (rest.includes(THROTTLED_PROBE)) {
    return parseCopy("throttled", counts, rest);
  }
  return parseCopy("copying", counts, rest);
}
