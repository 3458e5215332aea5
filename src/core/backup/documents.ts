/**
 * Status and result documents returned to callers
 */

import type { ProgressSnapshot, StatusDocument } from "../../types";

/** Fraction to a percentage with two decimals, e.g. 0.4213 -> 42.13 */
export function toPercent(fraction: number): number {
  return Math.round(fraction * 10000) / 100;
}

export function renderStatus(snapshot: ProgressSnapshot): StatusDocument {
  const doc: StatusDocument = {
    percent: toPercent(snapshot.progress),
    bytesDone: snapshot.bytesDone,
    files: {
      done: snapshot.filesDone,
      total: snapshot.filesTotal,
    },
  };

  if (snapshot.currentSource !== "") {
    doc.current = { source: snapshot.currentSource };
    if (snapshot.currentDest !== "") {
      doc.current.dest = snapshot.currentDest;
      doc.current.bytes = {
        done: snapshot.currentDone,
        total: snapshot.currentTotal,
      };
    }
  }

  return doc;
}
