import path from "node:path";

import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { lastRunPath } from "../core/paths.js";
import { formatClock, formatDay, formatRunStamp } from "../core/utils.js";

import { MaintenanceReportSchema, type MaintenanceReport, type StepResult } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type WrittenRunReport = {
  summaryPath: string;
  reportPath: string;
};

const SKIP_LABELS: Record<MaintenanceReport["skipped"][number]["reason"], string> = {
  pinned: "pinned",
  excluded: "excluded by config",
  dry_run: "dry run",
};

// =============================================================================
// FORMATTING
// =============================================================================

export function runSummaryFileName(startedAt: Date): string {
  return `brew-maintainer-${formatRunStamp(startedAt)}.log`;
}

export function formatRunReport(report: MaintenanceReport, summaryPath: string): string {
  const startedAt = new Date(report.startedAt);
  const lines: string[] = [
    `=== Brew Maintenance Run at ${formatDay(startedAt)} ${formatClock(startedAt)} ===`,
  ];
  if (report.dryRun) {
    lines.push("(dry run: no upgrades or cleanup performed)");
  }

  for (const step of report.steps) {
    lines.push("", `Running: ${step.command}`);
    lines.push(...formatStepLines(step));

    if (step.step === "upgrade") {
      lines.push(...formatUpgradeLines(report));
    }
  }

  if (report.error) {
    lines.push("", `${report.error.message}.`);
  }

  lines.push("", `Run complete. Log saved at ${summaryPath}`);
  return lines.join("\n") + "\n";
}

function formatStepLines(step: StepResult): string[] {
  const label = `brew ${step.step}`;
  switch (step.status) {
    case "completed":
      return [`✅ Step \`${label}\` completed.`];
    case "skipped":
      return [`⏭️  Step \`${label}\` skipped.`];
    case "failed":
      return [`❌ Step \`${label}\` failed.`, "Error:", step.error ?? ""];
  }
}

function formatUpgradeLines(report: MaintenanceReport): string[] {
  const lines: string[] = [];
  for (const name of report.upgraded) {
    lines.push(`  upgraded ${name}`);
  }
  for (const failure of report.failed) {
    const note =
      failure.reason === "input_requested"
        ? "requires user input, skipped"
        : failure.reason === "timeout"
          ? "timed out"
          : "failed";
    lines.push(`  ${failure.name}: ${note} (${failure.message})`);
  }
  for (const skip of report.skipped) {
    lines.push(`  ${skip.name}: not upgraded (${SKIP_LABELS[skip.reason]})`);
  }
  return lines;
}

// =============================================================================
// PERSISTENCE
// =============================================================================

export async function writeRunReport(
  logDir: string,
  report: MaintenanceReport,
): Promise<WrittenRunReport> {
  await fse.ensureDir(logDir);

  const summaryPath = path.join(logDir, runSummaryFileName(new Date(report.startedAt)));
  const reportPath = lastRunPath(logDir);

  await fse.writeFile(summaryPath, formatRunReport(report, summaryPath), "utf8");
  await fse.writeJson(reportPath, report, { spaces: 2 });

  return { summaryPath, reportPath };
}

export async function readLastRun(logDir: string): Promise<MaintenanceReport | null> {
  const reportPath = lastRunPath(logDir);
  if (!(await fse.pathExists(reportPath))) {
    return null;
  }

  let raw: unknown;
  try {
    raw = await fse.readJson(reportPath);
  } catch (err) {
    throw createLastRunInvalidError(reportPath, err);
  }

  const parsed = MaintenanceReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw createLastRunInvalidError(reportPath, parsed.error);
  }
  return parsed.data;
}

function createLastRunInvalidError(reportPath: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Last run report unreadable.",
    message: `Could not read the run report at ${reportPath}.`,
    hint: "Run `brew-maintainer run` to produce a fresh report.",
    cause,
  });
}
