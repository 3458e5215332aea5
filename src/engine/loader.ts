/**
 * Loading a backup engine from a module path
 */

import * as path from "node:path";
import { EngineLoadError } from "../core/errors";
import type { BackupEngine, EngineBinding } from "../types";
import { createLogger } from "../utils/logger";
import { BindingEngine } from "./binding";

const log = createLogger("engine");

function hasEngineMethods(value: unknown): value is Record<"createBackup" | "throttleBackup", unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "createBackup" in value &&
    typeof value.createBackup === "function" &&
    "throttleBackup" in value &&
    typeof value.throttleBackup === "function"
  );
}

export function isBackupEngine(value: unknown): value is BackupEngine {
  return hasEngineMethods(value);
}

export function isEngineBinding(value: unknown): value is EngineBinding {
  return hasEngineMethods(value);
}

function exportOf(mod: unknown, name: string): unknown {
  if (typeof mod !== "object" || mod === null || !(name in mod)) {
    return undefined;
  }
  return Reflect.get(mod, name);
}

/**
 * Turn a loaded module into an engine. The module exports either
 * `binding` (native-style callbacks with an opaque context) or
 * `engine` / a default export (a ready `BackupEngine`).
 */
export function engineFromModule(mod: unknown, source: string): BackupEngine {
  const binding = exportOf(mod, "binding");
  if (binding !== undefined) {
    if (!isEngineBinding(binding)) {
      throw new EngineLoadError(
        `${source}: "binding" export must have createBackup and throttleBackup functions`,
      );
    }
    log.debug(`Using native-style engine binding from ${source}`);
    return new BindingEngine(binding);
  }

  const engine = exportOf(mod, "engine") ?? exportOf(mod, "default");
  if (!isBackupEngine(engine)) {
    throw new EngineLoadError(
      `${source} does not export a backup engine (expected "engine", "binding" or a default export)`,
    );
  }
  log.debug(`Using backup engine from ${source}`);
  return engine;
}

export async function loadEngine(modulePath: string): Promise<BackupEngine> {
  const resolved = path.resolve(modulePath);
  let mod: unknown;
  try {
    mod = await import(resolved);
  } catch (error) {
    throw new EngineLoadError(`Failed to load backup engine from ${resolved}`, { cause: error });
  }
  return engineFromModule(mod, resolved);
}
