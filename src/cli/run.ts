import { InvalidArgumentError, type Command } from "commander";

import {
  ExecaBrewExecutor,
  type CommandExecutor,
  type ExecaBrewExecutorOptions,
} from "../brew/executor.js";
import type { MaintainerConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import {
  createDailyJsonlLogger,
  createStdoutLogger,
  createTeeLogger,
  resolveLogLevel,
  type EventLogger,
} from "../core/logger.js";
import { ensureLogDir, resolveLogDir } from "../core/paths.js";
import { hoursToMs, minutesToMs, sleep } from "../core/utils.js";
import { BrewMaintainer, runMaintenance } from "../maintenance/maintainer.js";
import { writeRunReport } from "../maintenance/report.js";
import type { MaintenanceReport } from "../maintenance/types.js";

import { loadConfigForCli } from "./config.js";
import { createStopSignalHandler } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  config?: string;
  dryRun?: boolean;
  timeout?: number;
  exclude?: string[];
  cleanup?: boolean;
  every?: number;
  logDir?: string;
  debug?: boolean;
};

export type RunCommandDeps = {
  createExecutor?: (opts: ExecaBrewExecutorOptions) => CommandExecutor;
  write?: (line: string) => void;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
  home?: string;
  // Replaces the SIGINT/SIGTERM handler for the --every loop.
  stopSignal?: AbortSignal;
};

export type RunSettings = {
  upgradeTimeoutMs: number;
  exclude: string[];
  cleanup: boolean;
  dryRun: boolean;
  everyMs: number | null;
  logDir?: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerRunCommand(program: Command): void {
  program
    .command("run", { isDefault: true })
    .description("Update, upgrade and clean up Homebrew (default command)")
    .option("--config <path>", "Config file (default: ~/.config/brew-maintainer/config.yaml)")
    .option("--dry-run", "List upgrades without performing them", false)
    .option("--timeout <minutes>", "Per-package upgrade timeout in minutes", parsePositiveNumber)
    .option("--exclude <name>", "Never upgrade this package (repeatable)", collectValues, [])
    .option("--no-cleanup", "Skip brew cleanup")
    .option("--every <hours>", "Keep running, one maintenance run every N hours", parsePositiveNumber)
    .option("--log-dir <dir>", "Directory for logs and run reports")
    .option("--debug", "Verbose logging and error details", false)
    .action(async (opts: RunCommandOptions) => {
      await runCommand(opts);
    });
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// =============================================================================
// COMMAND
// =============================================================================

export async function runCommand(
  opts: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<void> {
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  const { config } = loadConfigForCli({ explicitConfigPath: opts.config, env, home: deps.home });
  const settings = resolveRunSettings(config, opts);

  const logDir = ensureLogDir(resolveLogDir({ override: settings.logDir }));
  const logger = createTeeLogger(
    createDailyJsonlLogger(logDir, { clock: now }),
    createStdoutLogger({
      minLevel: opts.debug ? "debug" : resolveLogLevel(env),
      clock: now,
      write: deps.write,
    }),
  );
  logger.log({ type: "logging.init", payload: { log_dir: logDir } });

  const createExecutor =
    deps.createExecutor ?? ((o: ExecaBrewExecutorOptions) => new ExecaBrewExecutor(o));
  const maintainer = new BrewMaintainer(
    createExecutor({ brewPath: config.brew_path, extraEnv: config.env, logger }),
  );

  const runOnce = async (): Promise<{ report: MaintenanceReport; summaryPath: string }> => {
    const report = await runMaintenance(maintainer, {
      upgradeTimeoutMs: settings.upgradeTimeoutMs,
      exclude: settings.exclude,
      cleanup: settings.cleanup,
      dryRun: settings.dryRun,
      logger,
      now,
    });
    const written = await writeRunReport(logDir, report);
    logger.log({ type: "run.report", payload: { summary_path: written.summaryPath } });
    return { report, summaryPath: written.summaryPath };
  };

  if (settings.everyMs === null) {
    const { report, summaryPath } = await runOnce();
    if (report.status === "failed") {
      throw createRunFailedError(report, summaryPath);
    }
    return;
  }

  await runServiceLoop(runOnce, settings.everyMs, logger, deps.stopSignal);
}

export function resolveRunSettings(config: MaintainerConfig, opts: RunCommandOptions): RunSettings {
  return {
    upgradeTimeoutMs: minutesToMs(opts.timeout ?? config.upgrade_timeout_minutes),
    exclude: Array.from(new Set([...config.exclude, ...(opts.exclude ?? [])])),
    // commander defaults --no-cleanup to true, so only an explicit false overrides config.
    cleanup: opts.cleanup === false ? false : config.cleanup,
    dryRun: opts.dryRun ?? false,
    everyMs: opts.every === undefined ? null : hoursToMs(opts.every),
    logDir: opts.logDir ?? config.log_dir,
  };
}

// =============================================================================
// SERVICE LOOP
// =============================================================================

async function runServiceLoop(
  runOnce: () => Promise<{ report: MaintenanceReport; summaryPath: string }>,
  everyMs: number,
  logger: EventLogger,
  stopSignal?: AbortSignal,
): Promise<void> {
  const handler = stopSignal
    ? null
    : createStopSignalHandler({
        onSignal: (signal) => logger.log({ type: "service.stop", payload: { signal } }),
      });
  const signal = stopSignal ?? handler?.signal;

  logger.log({ type: "service.start", payload: { every_ms: everyMs } });
  try {
    while (!signal?.aborted) {
      try {
        await runOnce();
      } catch (err) {
        // Runs report their own step failures; this catches report-writing errors.
        logger.log({
          type: "service.run_error",
          level: "error",
          payload: { message: err instanceof Error ? err.message : String(err) },
        });
      }
      if (signal?.aborted) break;
      logger.log({ type: "service.sleep", level: "debug", payload: { ms: everyMs } });
      await sleep(everyMs, signal);
    }
  } finally {
    handler?.cleanup();
  }
  logger.log({ type: "service.exit" });
}

function createRunFailedError(report: MaintenanceReport, summaryPath: string): UserFacingError {
  const failure = report.error;
  const title = failure ? `${failure.message}.` : "Maintenance run failed.";
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.brew,
    title,
    message: failure ? `${failure.message}: ${failure.detail}` : title,
    hint: `See the run summary at ${summaryPath}.`,
  });
}
