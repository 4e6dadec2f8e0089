import type { Command } from "commander";

import { resolveLogDir } from "../core/paths.js";
import { readLastRun } from "../maintenance/report.js";
import type { MaintenanceReport, StepResult } from "../maintenance/types.js";

import { loadConfigForCli } from "./config.js";

export type StatusCommandOptions = {
  config?: string;
  logDir?: string;
};

export type StatusCommandDeps = {
  write?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  home?: string;
};

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the result of the last maintenance run")
    .option("--config <path>", "Config file")
    .option("--log-dir <dir>", "Directory holding run reports")
    .action(async (opts: StatusCommandOptions) => {
      await statusCommand(opts);
    });
}

export async function statusCommand(
  opts: StatusCommandOptions,
  deps: StatusCommandDeps = {},
): Promise<void> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const { config } = loadConfigForCli({
    explicitConfigPath: opts.config,
    env: deps.env,
    home: deps.home,
  });
  const logDir = resolveLogDir({ override: opts.logDir ?? config.log_dir });

  const report = await readLastRun(logDir);
  if (!report) {
    write(`No runs recorded in ${logDir}.`);
    write("Start a run with: brew-maintainer run");
    process.exitCode = 1;
    return;
  }

  for (const line of formatStatusLines(report)) {
    write(line);
  }
}

export function formatStatusLines(report: MaintenanceReport): string[] {
  const lines = [
    `Status: ${report.status}${report.dryRun ? " (dry run)" : ""}`,
    `Started: ${report.startedAt}`,
    `Finished: ${report.finishedAt}`,
    "",
    formatPackageCounts(report),
  ];

  if (report.error) {
    lines.push(`Error: ${report.error.message}: ${report.error.detail}`);
  }

  lines.push("", ...formatStepTable(report.steps));

  if (report.failed.length > 0) {
    lines.push("", "Failed upgrades:");
    for (const failure of report.failed) {
      lines.push(`  ${failure.name}  ${failure.reason}`);
    }
  }

  return lines;
}

function formatPackageCounts(report: MaintenanceReport): string {
  const parts = [
    `outdated=${report.outdated.length}`,
    `upgraded=${report.upgraded.length}`,
    `failed=${report.failed.length}`,
    `skipped=${report.skipped.length}`,
  ];
  return `Packages: ${parts.join("  ")}`;
}

function formatStepTable(rows: StepResult[]): string[] {
  const lines = ["Steps:"];
  if (rows.length === 0) {
    lines.push("  (no steps recorded for this run)");
    return lines;
  }

  const stepWidth = Math.max("Step".length, ...rows.map((r) => r.step.length));
  const statusWidth = Math.max("Status".length, ...rows.map((r) => r.status.length));

  lines.push(`  ${pad("Step", stepWidth)}  ${pad("Status", statusWidth)}  Command`);
  for (const row of rows) {
    lines.push(`  ${pad(row.step, stepWidth)}  ${pad(row.status, statusWidth)}  ${row.command}`);
  }
  return lines;
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
