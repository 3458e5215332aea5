/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatStatusLine, formatSummary } from "./formatters";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  LOGO,
  message,
  note,
  outro,
  spinner,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  warn: output.warn,
  error: output.error,
  message: output.message,
  spinner: output.spinner,
};
