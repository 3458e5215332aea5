import * as path from "node:path";
import { parseArgs } from "node:util";
import {
  ConfigError,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  getSourceRoots,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "../../config/loader";
import { DEFAULT_STATUS_INTERVAL_MS } from "../../config/defaults";
import { BackupController, NoBackupRunningError, resolveBackupLayout } from "../../core";
import { loadEngine } from "../../engine";
import type { BackupOutcome, HotBackupConfig } from "../../types";
import { formatDuration, formatRate } from "../../utils/format";
import { logger, setLogLevel } from "../../utils/logger";
import { color, formatStatusLine, formatSummary, ui } from "../ui";

export const INTERRUPT_REASON = "Backup interrupted by user";

/** Exit code after a second interrupt, as for a process killed by SIGINT */
const FORCED_EXIT_CODE = 130;

/**
 * Signal handler for a running backup. The first signal aborts it, which the
 * engine sees at its next poll; any further signal calls `forceExit`.
 */
export function createInterruptHandler(
  abort: AbortController,
  forceExit: () => void,
): () => void {
  return () => {
    if (abort.signal.aborted) {
      forceExit();
      return;
    }
    abort.abort(INTERRUPT_REASON);
  };
}

type BackupArgs = ReturnType<typeof parseBackupArgs>["values"];

function parseBackupArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: true,
  });
}

/**
 * Config file merged with inline flags, or inline flags alone when there is
 * no file. Returns null after reporting what is missing.
 */
async function resolveConfig(values: BackupArgs): Promise<HotBackupConfig | null> {
  const inlineOptions = extractInlineOptions(values);

  try {
    const config = await findAndLoadConfig(values.config);
    return hasInlineOptions(inlineOptions) ? mergeInlineConfig(config, inlineOptions) : config;
  } catch (error) {
    if (!(error instanceof ConfigError) || values.config) {
      throw error;
    }
    if (canRunWithoutConfigFile(inlineOptions)) {
      return createConfigFromInlineOptions(inlineOptions);
    }
    const validation = validateInlineOptionsForConfigFreeMode(inlineOptions);
    ui.error("No config file found and inline options are insufficient:");
    for (const err of validation.errors) {
      ui.message(`  - ${err}`);
    }
    ui.info("\nEither create a config file or provide required inline options.");
    ui.info("Required: --data-dir (and --engine to run a backup)");
    return null;
  }
}

function describeStatus(controller: BackupController): string {
  try {
    return formatStatusLine(controller.status());
  } catch (error) {
    if (!(error instanceof NoBackupRunningError)) {
      logger.warn("Could not read backup status", error);
    }
    return "Preparing backup...";
  }
}

function printLayout(sourceDirs: string[], destDirs: string[]): void {
  ui.note(
    sourceDirs
      .map((source, i) => `${source} ${color.dim("→")} ${destDirs[i] ?? "?"}`)
      .join("\n"),
    "Backup layout",
  );
}

function printOutcome(outcome: BackupOutcome, throttle: number | undefined): void {
  const { result } = outcome;
  ui.note(
    formatSummary([
      { label: "Status", value: outcome.ok ? color.green("completed") : color.red("failed") },
      { label: "Sources", value: outcome.sourceDirs.join(", ") },
      { label: "Destinations", value: outcome.destDirs.join(", ") },
      { label: "Throttle", value: throttle === undefined ? undefined : formatRate(throttle) },
      { label: "Duration", value: formatDuration(outcome.durationMs) },
      { label: "Error", value: outcome.ok ? undefined : result.message || "(none reported)" },
      {
        label: "Errno",
        value: result.errno === undefined ? undefined : `${result.errno} (${result.strerror})`,
      },
      { label: "Reason", value: result.reason },
    ]),
    "Backup Summary",
  );
}

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseBackupArgs(args);

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const destination = positionals[0];
  if (!destination || positionals.length > 1) {
    ui.error("Expected exactly one backup destination");
    ui.info(`Run ${color.cyan("hotbackup backup --help")} for usage`);
    return 1;
  }
  const destRoot = path.resolve(destination);

  try {
    const config = await resolveConfig(values);
    if (!config) {
      return 1;
    }
    if (!values.verbose && config.logging?.level) {
      setLogLevel(config.logging.level);
    }

    ui.intro("hotbackup backup");

    if (values["dry-run"]) {
      const layout = await resolveBackupLayout(getSourceRoots(config), destRoot);
      printLayout(layout.sourceDirs, layout.destDirs);
      ui.warn("[DRY RUN] No directories were created and the engine was not started.");
      ui.outro("Dry run complete");
      return 0;
    }

    if (!config.engine) {
      ui.error("No backup engine configured");
      ui.info(`Set ${color.cyan("engine.module")} in the config file or pass ${color.cyan("--engine <path>")}`);
      return 1;
    }

    const engine = await loadEngine(config.engine.module);
    const abort = new AbortController();
    const controller = new BackupController({
      engine,
      sources: getSourceRoots(config),
      signal: abort.signal,
    });

    const throttle = config.backup?.throttle;
    if (throttle !== undefined) {
      controller.throttle(throttle);
    }

    const s = ui.spinner();
    const interrupt = createInterruptHandler(abort, () => {
      s.stop(INTERRUPT_REASON, 1);
      process.exit(FORCED_EXIT_CODE);
    });
    process.on("SIGINT", interrupt);
    process.on("SIGTERM", interrupt);

    s.start("Preparing backup...");
    const timer = setInterval(
      () => s.message(describeStatus(controller)),
      config.backup?.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS,
    );

    let outcome: BackupOutcome;
    try {
      outcome = await controller.start(destRoot);
    } catch (error) {
      s.stop("Backup did not start", 1);
      throw error;
    } finally {
      clearInterval(timer);
      process.off("SIGINT", interrupt);
      process.off("SIGTERM", interrupt);
      controller.dispose();
    }

    s.stop(outcome.ok ? "Backup finished" : "Backup failed", outcome.ok ? 0 : 1);
    printOutcome(outcome, throttle);

    if (!outcome.ok) {
      ui.cancel(outcome.result.reason ?? "Backup failed");
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${error instanceof Error ? error.message : String(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hotbackup backup")} - Take a live backup of the database directories

${color.dim("USAGE:")}
  hotbackup backup <destination> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./hotbackup.config.yaml)
      --dry-run           Show the source/destination layout without backing up
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --data-dir <path>   Database data directory
      --log-dir <path>    Separate log directory, if any
      --engine <path>     Module exporting the backup engine
      --throttle <bps>    Maximum copy rate in bytes per second (0 = unlimited)

${color.dim("DESCRIPTION:")}
  Copies the data directory (and the log directory, when it is configured and
  not inside the data directory) into <destination> while the server keeps
  running. With two source directories the destination gets ${color.cyan("data/")} and
  ${color.cyan("log/")} subdirectories. Press Ctrl+C to cancel the backup at the
  engine's next progress report; press it again to exit immediately.

${color.dim("EXAMPLES:")}
  hotbackup backup /backups/today
  hotbackup backup /backups/today --throttle 52428800
  hotbackup backup /backups/today --dry-run
  hotbackup backup /backups/today --data-dir /var/lib/db --engine ./engine.js
`);
}
