import { mkdir, mkdtemp, realpath, rm, symlink } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  canonicalPath,
  ensureTrailingSep,
  isPathWithinDir,
  isSameLocation,
} from "../../src/utils/path";

describe("isPathWithinDir", () => {
  test("accepts the directory itself and paths below it", () => {
    expect(isPathWithinDir("/data/db", "/data/db")).toBe(true);
    expect(isPathWithinDir("/data/db/journal", "/data/db")).toBe(true);
    expect(isPathWithinDir("/data/db/journal", "/data/db/")).toBe(true);
  });

  test("rejects siblings sharing a name prefix", () => {
    expect(isPathWithinDir("/data/db2", "/data/db")).toBe(false);
  });

  test("rejects paths escaping through ..", () => {
    expect(isPathWithinDir("/data/db/../log", "/data/db")).toBe(false);
  });
});

describe("ensureTrailingSep", () => {
  test("adds a separator only when missing", () => {
    expect(ensureTrailingSep("/data")).toBe(`/data${path.sep}`);
    expect(ensureTrailingSep(`/data${path.sep}`)).toBe(`/data${path.sep}`);
  });
});

describe("filesystem checks", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await realpath(await mkdtemp(path.join(os.tmpdir(), "hotbackup-path-test-")));
    await mkdir(path.join(tempDir, "db"));
    await mkdir(path.join(tempDir, "log"));
    await symlink(path.join(tempDir, "db"), path.join(tempDir, "db-link"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("canonicalPath resolves symbolic links and dot segments", async () => {
    await expect(canonicalPath(path.join(tempDir, "db-link"))).resolves.toBe(
      path.join(tempDir, "db"),
    );
    await expect(canonicalPath(`${tempDir}/log/../db`)).resolves.toBe(path.join(tempDir, "db"));
  });

  test("canonicalPath rejects a missing path", async () => {
    await expect(canonicalPath(path.join(tempDir, "missing"))).rejects.toThrow();
  });

  test("isSameLocation matches a link and its target", () => {
    expect(isSameLocation(path.join(tempDir, "db-link"), path.join(tempDir, "db"))).toBe(true);
    expect(isSameLocation(path.join(tempDir, "log"), path.join(tempDir, "db"))).toBe(false);
  });

  test("isSameLocation short-circuits identical strings", () => {
    expect(isSameLocation("/no/such/dir", "/no/such/dir")).toBe(true);
  });
});
