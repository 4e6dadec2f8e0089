/**
 * Maintenance run orchestration.
 * Purpose: drive update → outdated → upgrade → cleanup against a CommandExecutor.
 * Assumptions: per-package upgrade failures never abort a run; the other steps do.
 * Usage: runMaintenance(new BrewMaintainer(executor), { upgradeTimeoutMs, logger }).
 */

import type { CommandExecutor } from "../brew/executor.js";
import { formatPackage, parseOutdatedPackages, type OutdatedPackage } from "../brew/outdated.js";
import { BrewError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { silentLogger, type EventLogger } from "../core/logger.js";

import type {
  MaintenanceReport,
  StepName,
  UpgradeFailure,
  UpgradeSkip,
} from "./types.js";

// =============================================================================
// TYPES & CONSTANTS
// =============================================================================

export const DEFAULT_UPGRADE_TIMEOUT_MS = 5 * 60_000;
export const OUTPUT_PREVIEW_LIMIT = 4000;

export type UpgradeOutcome = {
  upgraded: string[];
  failed: UpgradeFailure[];
  skipped: UpgradeSkip[];
};

export type UpgradeOptions = {
  exclude?: string[];
  dryRun?: boolean;
  logger?: EventLogger;
};

export type MaintenanceOptions = {
  upgradeTimeoutMs?: number;
  exclude?: string[];
  cleanup?: boolean;
  dryRun?: boolean;
  logger?: EventLogger;
  now?: () => Date;
};

export const STEP_COMMANDS: Record<StepName, string> = {
  update: "brew update",
  outdated: "brew outdated --json",
  upgrade: "brew upgrade",
  cleanup: "brew cleanup",
};

const STEP_FAILURE_MESSAGES: Record<Exclude<StepName, "upgrade">, string> = {
  update: "Failed to update reference repositories",
  outdated: "Failed in finding outdated packages",
  cleanup: "Failed to cleanup",
};

// =============================================================================
// MAINTAINER
// =============================================================================

export class BrewMaintainer {
  constructor(private readonly executor: CommandExecutor) {}

  updateReferenceRepositories(): Promise<string> {
    return this.executor.execute({ kind: "update", env: this.executor.envs() });
  }

  async findOutdatedPackages(): Promise<OutdatedPackage[]> {
    const output = await this.executor.execute({ kind: "outdated", env: this.executor.envs() });
    return parseOutdatedPackages(output);
  }

  async upgradePackagesWithTimeout(
    packages: OutdatedPackage[],
    timeoutMs: number,
    opts: UpgradeOptions = {},
  ): Promise<UpgradeOutcome> {
    const log = opts.logger ?? silentLogger;
    const excluded = new Set(opts.exclude ?? []);
    const outcome: UpgradeOutcome = { upgraded: [], failed: [], skipped: [] };

    for (const pkg of packages) {
      const skipReason = excluded.has(pkg.name)
        ? "excluded"
        : pkg.pinned
          ? "pinned"
          : opts.dryRun
            ? "dry_run"
            : null;

      if (skipReason) {
        outcome.skipped.push({ name: pkg.name, reason: skipReason });
        log.log({ type: "upgrade.skip", payload: { name: pkg.name, reason: skipReason } });
        continue;
      }

      log.log({ type: "upgrade.start", payload: { name: pkg.name, timeout_ms: timeoutMs } });
      try {
        await this.executor.executeWithTimeout(
          { kind: "upgrade", packageName: pkg.name, env: this.executor.envs() },
          timeoutMs,
        );
        outcome.upgraded.push(pkg.name);
        log.log({ type: "upgrade.complete", payload: { name: pkg.name } });
      } catch (err) {
        const failure = toUpgradeFailure(pkg.name, err);
        outcome.failed.push(failure);
        log.log({
          type: failure.reason === "input_requested" ? "upgrade.input_requested" : "upgrade.fail",
          level: "warn",
          payload: { name: failure.name, reason: failure.reason, message: failure.message },
        });
      }
    }

    return outcome;
  }

  cleanup(): Promise<string> {
    return this.executor.execute({ kind: "cleanup", env: this.executor.envs() });
  }
}

function toUpgradeFailure(name: string, err: unknown): UpgradeFailure {
  if (err instanceof BrewError) {
    return { name, reason: err.reason, message: err.message };
  }
  return { name, reason: "execution_failed", message: formatErrorMessage(err) };
}

// =============================================================================
// RUN
// =============================================================================

type StepOutcome<T> = { ok: true; value: T } | { ok: false };

export async function runMaintenance(
  maintainer: BrewMaintainer,
  options: MaintenanceOptions = {},
): Promise<MaintenanceReport> {
  const now = options.now ?? (() => new Date());
  const log = options.logger ?? silentLogger;
  const dryRun = options.dryRun ?? false;
  const timeoutMs = options.upgradeTimeoutMs ?? DEFAULT_UPGRADE_TIMEOUT_MS;

  const report: MaintenanceReport = {
    startedAt: now().toISOString(),
    finishedAt: "",
    status: "completed",
    dryRun,
    steps: [],
    outdated: [],
    upgraded: [],
    failed: [],
    skipped: [],
  };

  log.log({ type: "run.start", payload: { dry_run: dryRun, upgrade_timeout_ms: timeoutMs } });

  const update = await runRequiredStep(report, log, "update", () =>
    maintainer.updateReferenceRepositories(),
  );
  if (!update.ok) return finishRun(report, log, now);

  const outdated = await runRequiredStep(report, log, "outdated", () =>
    maintainer.findOutdatedPackages(),
  );
  if (!outdated.ok) return finishRun(report, log, now);

  report.outdated = outdated.value;
  log.log({
    type: "outdated.found",
    payload: { count: outdated.value.length, packages: outdated.value.map(formatPackage) },
  });

  log.log({ type: "step.start", payload: { step: "upgrade", command: STEP_COMMANDS.upgrade } });
  const upgrade = await maintainer.upgradePackagesWithTimeout(outdated.value, timeoutMs, {
    exclude: options.exclude,
    dryRun,
    logger: log,
  });
  report.upgraded = upgrade.upgraded;
  report.failed = upgrade.failed;
  report.skipped = upgrade.skipped;

  if (upgrade.failed.length > 0) {
    const error = `${upgrade.failed.length} package(s) failed to upgrade`;
    report.steps.push({ step: "upgrade", command: STEP_COMMANDS.upgrade, status: "failed", error });
    log.log({ type: "step.fail", level: "warn", payload: { step: "upgrade", message: error } });
  } else {
    report.steps.push({ step: "upgrade", command: STEP_COMMANDS.upgrade, status: "completed" });
    log.log({
      type: "step.complete",
      payload: { step: "upgrade", upgraded: upgrade.upgraded.length },
    });
  }

  if (dryRun || !(options.cleanup ?? true)) {
    report.steps.push({ step: "cleanup", command: STEP_COMMANDS.cleanup, status: "skipped" });
    log.log({
      type: "step.skip",
      payload: { step: "cleanup", reason: dryRun ? "dry_run" : "disabled" },
    });
    return finishRun(report, log, now);
  }

  await runRequiredStep(report, log, "cleanup", () => maintainer.cleanup());
  return finishRun(report, log, now);
}

async function runRequiredStep<T>(
  report: MaintenanceReport,
  log: EventLogger,
  step: Exclude<StepName, "upgrade">,
  action: () => Promise<T>,
): Promise<StepOutcome<T>> {
  const command = STEP_COMMANDS[step];
  log.log({ type: "step.start", payload: { step, command } });

  try {
    const value = await action();
    report.steps.push({ step, command, status: "completed" });
    log.log({
      type: "step.complete",
      payload: typeof value === "string" ? { step, output: preview(value) } : { step },
    });
    return { ok: true, value };
  } catch (err) {
    const detail = formatErrorMessage(err);
    const message = STEP_FAILURE_MESSAGES[step];
    report.steps.push({ step, command, status: "failed", error: detail });
    report.status = "failed";
    report.error = { step, message, detail };
    log.log({ type: "step.fail", level: "error", payload: { step, message, detail } });
    return { ok: false };
  }
}

function finishRun(
  report: MaintenanceReport,
  log: EventLogger,
  now: () => Date,
): MaintenanceReport {
  report.finishedAt = now().toISOString();
  log.log({
    type: report.status === "completed" ? "run.complete" : "run.fail",
    level: report.status === "completed" ? "info" : "error",
    payload: {
      upgraded: report.upgraded.length,
      failed: report.failed.length,
      skipped: report.skipped.length,
    },
  });
  return report;
}

function preview(text: string): string {
  const trimmed = text.trim();
  return trimmed.length <= OUTPUT_PREVIEW_LIMIT ? trimmed : trimmed.slice(0, OUTPUT_PREVIEW_LIMIT);
}
