import { getSystemErrorName } from "node:util";
import errnoMessages from "../data/errno-messages.json";

const ERRNO_MESSAGES: Record<string, string> = errnoMessages;

/**
 * Platform description of a positive errno value, as `strerror(3)` words it.
 */
export function describeErrno(errno: number): string {
  if (errno === 0) {
    return "Success";
  }

  if (Number.isSafeInteger(errno) && errno > 0) {
    const message = ERRNO_MESSAGES[getSystemErrorName(-errno)];
    if (message !== undefined) {
      return message;
    }
  }

  return `Unknown error ${errno}`;
}
