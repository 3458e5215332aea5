import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { DEFAULT_STATUS_INTERVAL_MS, deepMerge } from "../../src/config/defaults";
import {
  ConfigError,
  findConfigFile,
  getSourceRoots,
  loadConfig,
} from "../../src/config/loader";

describe("loadConfig", () => {
  let tempDir: string;

  async function writeConfig(name: string, content: string): Promise<string> {
    const file = path.join(tempDir, name);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content);
    return file;
  }

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "hotbackup-config-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("loads YAML and applies defaults", async () => {
    const file = await writeConfig(
      "yaml/hotbackup.config.yaml",
      ["version: \"1\"", "storage:", "  dataDir: /var/lib/db", ""].join("\n"),
    );

    const config = await loadConfig(file);

    expect(config).toEqual({
      version: "1",
      storage: { dataDir: "/var/lib/db" },
      engine: undefined,
      backup: { statusIntervalMs: DEFAULT_STATUS_INTERVAL_MS },
      logging: { level: "info" },
    });
  });

  test("loads JSON and keeps explicit settings", async () => {
    const file = await writeConfig(
      "json/hotbackup.config.json",
      JSON.stringify({
        version: "1",
        storage: { dataDir: "/var/lib/db", logDir: "/var/log/db" },
        engine: { module: "/opt/engine/index.js" },
        backup: { throttle: 1048576 },
        logging: { level: "debug" },
      }),
    );

    const config = await loadConfig(file);

    expect(config.storage).toEqual({ dataDir: "/var/lib/db", logDir: "/var/log/db" });
    expect(config.engine).toEqual({ module: "/opt/engine/index.js" });
    expect(config.backup).toEqual({ throttle: 1048576, statusIntervalMs: DEFAULT_STATUS_INTERVAL_MS });
    expect(config.logging).toEqual({ level: "debug" });
  });

  test("resolves relative paths against the config file's directory", async () => {
    const file = await writeConfig(
      "relative/conf/hotbackup.config.yml",
      [
        "version: \"1\"",
        "storage:",
        "  dataDir: ../db",
        "  logDir: journal",
        "engine:",
        "  module: ./engine.js",
      ].join("\n"),
    );
    const confDir = path.join(tempDir, "relative", "conf");

    const config = await loadConfig(file);

    expect(config.storage.dataDir).toBe(path.join(tempDir, "relative", "db"));
    expect(config.storage.logDir).toBe(path.join(confDir, "journal"));
    expect(config.engine?.module).toBe(path.join(confDir, "engine.js"));
  });

  test("fails for a missing file", async () => {
    const missing = path.join(tempDir, "nope.yaml");

    await expect(loadConfig(missing)).rejects.toThrow(`Config file not found: ${missing}`);
  });

  test("fails for an unsupported extension", async () => {
    const file = await writeConfig("config.toml", "version = 1");

    await expect(loadConfig(file)).rejects.toThrow(
      "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
    );
  });

  test("fails for malformed JSON", async () => {
    const file = await writeConfig("broken.json", "{ version: ");

    await expect(loadConfig(file)).rejects.toBeInstanceOf(ConfigError);
  });

  test("fails for a file that does not hold an object", async () => {
    const file = await writeConfig("list.yaml", "- one\n- two\n");

    await expect(loadConfig(file)).rejects.toThrow("Config file must contain an object");
  });

  test.each([
    ["storage:\n  dataDir: /db\n", "Config must have a 'version' field"],
    ["version: \"1\"\n", "Config must have a 'storage' section"],
    ["version: \"1\"\nstorage:\n  logDir: /log\n", "storage.dataDir must be a string"],
    [
      "version: \"1\"\nstorage:\n  dataDir: /db\nbackup:\n  throttle: -5\n",
      "backup.throttle must be a non-negative number of bytes per second",
    ],
    [
      "version: \"1\"\nstorage:\n  dataDir: /db\nbackup:\n  statusIntervalMs: 0\n",
      "backup.statusIntervalMs must be a positive integer",
    ],
    [
      "version: \"1\"\nstorage:\n  dataDir: /db\nengine:\n  module: 42\n",
      "engine.module must be a string",
    ],
    [
      "version: \"1\"\nstorage:\n  dataDir: /db\nlogging:\n  level: loud\n",
      "logging.level must be one of: debug, info, warn, error",
    ],
  ])("rejects invalid config %#", async (content, message) => {
    const file = await writeConfig(`invalid-${message.length}.yaml`, content);

    await expect(loadConfig(file)).rejects.toThrow(message);
  });
});

describe("findConfigFile", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "hotbackup-find-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("returns null when no config file exists", () => {
    expect(findConfigFile(tempDir)).toBeNull();
  });

  test("prefers the YAML name over JSON", async () => {
    await writeFile(path.join(tempDir, "hotbackup.config.json"), "{}");
    await writeFile(path.join(tempDir, "hotbackup.config.yaml"), "");

    expect(findConfigFile(tempDir)).toBe(path.join(tempDir, "hotbackup.config.yaml"));
  });

  test("skips a directory carrying a config file name", async () => {
    const dir = path.join(tempDir, "nested");
    await mkdir(path.join(dir, "hotbackup.config.yaml"), { recursive: true });
    await writeFile(path.join(dir, "hotbackup.config.yml"), "");

    expect(findConfigFile(dir)).toBe(path.join(dir, "hotbackup.config.yml"));
  });
});

describe("getSourceRoots", () => {
  test("omits an empty log directory", () => {
    expect(getSourceRoots({ version: "1", storage: { dataDir: "/db", logDir: "" } })).toEqual({
      dataDir: "/db",
    });
  });

  test("keeps a separate log directory", () => {
    expect(getSourceRoots({ version: "1", storage: { dataDir: "/db", logDir: "/log" } })).toEqual({
      dataDir: "/db",
      logDir: "/log",
    });
  });
});

describe("deepMerge", () => {
  test("merges nested objects and lets the source win", () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: [1] }, { a: { y: 3 }, b: [2, 3] })).toEqual({
      a: { x: 1, y: 3 },
      b: [2, 3],
    });
  });

  test("skips undefined source values", () => {
    expect(deepMerge({ a: 1 }, { a: undefined, b: 2 })).toEqual({ a: 1, b: 2 });
  });
});
