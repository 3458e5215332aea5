/**
 * Summary and status formatters
 */

import color from "picocolors";
import type { StatusDocument } from "../../types";
import { formatBytes } from "../../utils/format";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

/**
 * One-line progress for the spinner, e.g.
 * `42.00% · 12/17 files · 464.46 KB · /data/db/foo`
 */
export function formatStatusLine(status: StatusDocument): string {
  const parts = [
    `${status.percent.toFixed(2)}%`,
    `${Math.max(status.files.done, 0)}/${status.files.total} files`,
    formatBytes(status.bytesDone),
  ];
  if (status.current) {
    parts.push(status.current.source);
  }
  return parts.join(" · ");
}
