import path from "node:path";

import { InvalidArgumentError, type Command } from "commander";
import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import {
  DEFAULT_INTERVAL_SECONDS,
  buildFormulaDescriptor,
  type ServiceSchedule,
} from "../formula/descriptor.js";
import { inspectFormulaSource } from "../formula/inspect.js";
import { renderFormula } from "../formula/render.js";

import { parsePositiveNumber } from "./run.js";

// =============================================================================
// TYPES
// =============================================================================

export type FormulaRenderOptions = {
  releaseVersion?: string;
  url?: string;
  sha256?: string;
  homepage?: string;
  schedule?: "interval" | "keep-alive";
  interval?: number;
  every?: number;
  servicePath?: string;
  output?: string;
  allowPlaceholders?: boolean;
  templatePath?: string;
};

type Write = (line: string) => void;

const DEFAULT_KEEP_ALIVE_HOURS = DEFAULT_INTERVAL_SECONDS / 3600;

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerFormulaCommand(program: Command): void {
  const formula = program
    .command("formula")
    .description("Render or check the Homebrew formula that installs brew-maintainer");

  formula
    .command("render")
    .description("Render the formula from release values")
    .option("--release-version <version>", "Release version")
    .option("--url <url>", "Release archive URL")
    .option("--sha256 <hash>", "SHA-256 of the release archive")
    .option("--homepage <url>", "Project homepage")
    .option(
      "--schedule <kind>",
      "Service schedule: interval or keep-alive",
      parseScheduleKind,
      "interval",
    )
    .option("--interval <seconds>", "Seconds between interval runs", parseWholeSeconds)
    .option("--every <hours>", "Hours between runs of a keep-alive service", parsePositiveNumber)
    .option("--service-path <path>", "PATH exported to the service")
    .option("--output <file>", "Write the formula here instead of stdout")
    .option("--allow-placeholders", "Keep release placeholders for unset values", false)
    .action(async (opts: FormulaRenderOptions) => {
      await formulaRenderCommand(opts);
    });

  formula
    .command("check")
    .description("Check a rendered formula before publishing")
    .argument("<file>", "Formula file")
    .action(async (file: string) => {
      await formulaCheckCommand(file);
    });
}

function parseScheduleKind(value: string): "interval" | "keep-alive" {
  if (value === "interval" || value === "keep-alive") return value;
  throw new InvalidArgumentError('Expected "interval" or "keep-alive".');
}

function parseWholeSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive whole number of seconds.");
  }
  return parsed;
}

// =============================================================================
// RENDER
// =============================================================================

export async function formulaRenderCommand(
  opts: FormulaRenderOptions,
  deps: { write?: Write } = {},
): Promise<void> {
  const write = deps.write ?? ((line: string) => process.stdout.write(line));
  const descriptor = buildFormulaDescriptor({
    version: opts.releaseVersion,
    url: opts.url,
    sha256: opts.sha256,
    homepage: opts.homepage,
    schedule: resolveSchedule(opts),
    servicePath: opts.servicePath,
  });

  const rendered = await renderFormula(descriptor, {
    requireRelease: !opts.allowPlaceholders,
    templatePath: opts.templatePath,
  });

  if (!opts.output) {
    write(rendered);
    return;
  }

  const outputPath = path.resolve(opts.output);
  await fse.ensureDir(path.dirname(outputPath));
  await fse.writeFile(outputPath, rendered, "utf8");
  write(`Wrote formula to ${outputPath}\n`);
}

export function resolveSchedule(
  opts: Pick<FormulaRenderOptions, "schedule" | "interval" | "every">,
): ServiceSchedule {
  if (opts.schedule === "keep-alive") {
    if (opts.interval !== undefined) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.formula,
        title: "Conflicting schedule options.",
        message: "--interval applies to interval services only.",
        hint: "Use --every <hours> with --schedule keep-alive.",
      });
    }
    return { kind: "keep_alive", everyHours: opts.every ?? DEFAULT_KEEP_ALIVE_HOURS };
  }

  if (opts.every !== undefined) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.formula,
      title: "Conflicting schedule options.",
      message: "--every applies to keep-alive services only.",
      hint: "Use --interval <seconds> with --schedule interval.",
    });
  }
  return { kind: "interval", seconds: opts.interval ?? DEFAULT_INTERVAL_SECONDS };
}

// =============================================================================
// CHECK
// =============================================================================

export async function formulaCheckCommand(
  file: string,
  deps: { write?: Write } = {},
): Promise<void> {
  const write = deps.write ?? ((line: string) => process.stdout.write(line));
  const formulaPath = path.resolve(file);

  if (!(await fse.pathExists(formulaPath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.formula,
      title: "Formula file missing.",
      message: `No formula found at ${formulaPath}.`,
      next: "brew-maintainer formula render --output <file>",
    });
  }

  const inspection = inspectFormulaSource(await fse.readFile(formulaPath, "utf8"));
  if (inspection.issues.length === 0) {
    write(`${formulaPath}: ok\n`);
    return;
  }

  write(`${formulaPath}: ${inspection.issues.length} issue(s)\n`);
  for (const issue of inspection.issues) {
    write(`  - ${issue}\n`);
  }
  process.exitCode = 1;
}
