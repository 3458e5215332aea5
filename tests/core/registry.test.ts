import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { EMPTY_PROGRESS } from "../../src/core/backup/progress";
import { ManagerRegistry, type ProgressSource } from "../../src/core/backup/registry";
import { NoBackupRunningError } from "../../src/core/errors";
import type { ProgressSnapshot } from "../../src/types";
import { getLogLevel, type LogLevel, setLogLevel } from "../../src/utils/logger";

function sourceWith(bytesDone: number): ProgressSource {
  const snapshot: ProgressSnapshot = { ...EMPTY_PROGRESS, bytesDone };
  return { readProgress: () => ({ ...snapshot }) };
}

describe("ManagerRegistry", () => {
  let registry: ManagerRegistry;
  let originalLevel: LogLevel;
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    registry = new ManagerRegistry();
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    consoleLogSpy.mockRestore();
  });

  test("is empty initially", () => {
    expect(registry.current()).toBeUndefined();
  });

  test("claims an empty slot", () => {
    const a = sourceWith(1);

    expect(registry.tryClaim(a)).toBe("claimed");
    expect(registry.current()).toBe(a);
  });

  test("claiming again as the same holder is a plain claim", () => {
    const a = sourceWith(1);
    registry.tryClaim(a);

    expect(registry.tryClaim(a)).toBe("claimed");
  });

  test("overwrites another holder and logs the overlap", () => {
    setLogLevel("debug");
    const a = sourceWith(1);
    const b = sourceWith(2);
    registry.tryClaim(a);

    expect(registry.tryClaim(b)).toBe("replaced");

    expect(registry.current()).toBe(b);
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleLogSpy.mock.calls[0]?.[0])).toContain("[registry] A different backup");
  });

  test("releases only for the current holder", () => {
    const a = sourceWith(1);
    const b = sourceWith(2);
    registry.tryClaim(a);
    registry.tryClaim(b);

    expect(registry.releaseIfOwner(a)).toBe(false);
    expect(registry.current()).toBe(b);

    expect(registry.releaseIfOwner(b)).toBe(true);
    expect(registry.current()).toBeUndefined();
  });

  test("release on an empty slot does nothing", () => {
    expect(registry.releaseIfOwner(sourceWith(1))).toBe(false);
  });

  test("currentSnapshot reads the holder's progress", () => {
    registry.tryClaim(sourceWith(4096));

    expect(registry.currentSnapshot()).toEqual({ ...EMPTY_PROGRESS, bytesDone: 4096 });
  });

  test("currentSnapshot fails with 'no backup running' on an empty slot", () => {
    expect(() => registry.currentSnapshot()).toThrow(NoBackupRunningError);
    expect(() => registry.currentSnapshot()).toThrow("no backup running");
  });

  test("the registry lock is released after a failed lookup", () => {
    expect(() => registry.currentSnapshot()).toThrow(NoBackupRunningError);

    expect(registry.tryClaim(sourceWith(1))).toBe("claimed");
  });

  test("reads the holder's progress outside the registry lock", () => {
    const holder: ProgressSource = {
      readProgress: () => ({ ...EMPTY_PROGRESS, filesTotal: registry.current() === holder ? 1 : 0 }),
    };
    registry.tryClaim(holder);

    expect(registry.currentSnapshot().filesTotal).toBe(1);
  });
});
