/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { HotBackupConfig, SourceRoots } from "../types";

/**
 * Resolve relative paths in config against the directory of the config file
 */
export function resolvePaths(config: HotBackupConfig, configPath: string): HotBackupConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.resolve(configDir, p));

  const storage = {
    ...config.storage,
    dataDir: resolve(config.storage.dataDir),
  };
  if (config.storage.logDir) {
    storage.logDir = resolve(config.storage.logDir);
  }

  return {
    ...config,
    storage,
    engine: config.engine ? { module: resolve(config.engine.module) } : undefined,
  };
}

/**
 * Source roots handed to the backup controller. An empty log directory means
 * the server keeps its log inside the data directory.
 */
export function getSourceRoots(config: HotBackupConfig): SourceRoots {
  const { dataDir, logDir } = config.storage;
  return logDir ? { dataDir, logDir } : { dataDir };
}
