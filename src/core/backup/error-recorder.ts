/**
 * Engine error capture
 */

import type { ErrorDocument, RecordedError } from "../../types";
import { describeErrno } from "../../utils/errno";

/**
 * Keeps the first error the engine reports for an attempt, verbatim. The
 * message is not interpreted.
 */
export class ErrorRecorder {
  private recorded: RecordedError | undefined;

  /** Returns false when an earlier error was already recorded. */
  record(code: number, message: string): boolean {
    if (this.recorded !== undefined) {
      return false;
    }
    this.recorded = { code, message };
    return true;
  }

  isEmpty(): boolean {
    return this.recorded === undefined;
  }

  get(): RecordedError | undefined {
    return this.recorded === undefined ? undefined : { ...this.recorded };
  }

  /**
   * Error document for a failed attempt. Without a recorded error this is the
   * "nothing reported" document: empty message, errno 0.
   */
  render(): ErrorDocument {
    const code = this.recorded?.code ?? 0;
    return {
      message: this.recorded?.message ?? "",
      errno: code,
      strerror: describeErrno(code),
    };
  }

  reset(): void {
    this.recorded = undefined;
  }
}
