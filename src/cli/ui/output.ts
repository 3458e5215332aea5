/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;

export const LOGO = String.raw`
  _           _   _                _
 | |__   ___ | |_| |__   __ _  ___| | ___   _ _ __
 | '_ \ / _ \| __| '_ \ / _' |/ __| |/ / | | | '_ \
 | | | | (_) | |_| |_) | (_| | (__|   <| |_| | |_) |
 |_| |_|\___/ \__|_.__/ \__,_|\___|_|\_\\__,_| .__/
                                             |_|
`;

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;
