import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { FormulaError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import {
  BINARY_NAME,
  describeSchedule,
  serviceRunArgs,
  validateFormulaDescriptor,
  type FormulaDescriptor,
} from "./descriptor.js";

// =============================================================================
// TYPES
// =============================================================================

export type FormulaTemplateValues = {
  desc: string;
  homepage: string;
  version: string;
  url: string;
  sha256: string;
  license: string;
  binaryName: string;
  runCommand: string;
  keepAlive: boolean;
  intervalSeconds: number;
  logPath: string;
  errorLogPath: string;
  servicePath: string;
  scheduleText: string;
};

export type RenderFormulaOptions = {
  requireRelease?: boolean;
  templatePath?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderFormula(
  descriptor: FormulaDescriptor,
  opts: RenderFormulaOptions = {},
): Promise<string> {
  const issues = validateFormulaDescriptor(descriptor, { requireRelease: opts.requireRelease });
  if (issues.length > 0) {
    throw createFormulaInvalidError(issues);
  }

  const templatePath = opts.templatePath ?? defaultFormulaTemplatePath();
  const template = await loadTemplate(templatePath);

  let output: string;
  try {
    output = template(buildTemplateValues(descriptor)).trim();
  } catch (err) {
    throw createFormulaRenderError(templatePath, err);
  }

  return output + "\n";
}

export function buildTemplateValues(descriptor: FormulaDescriptor): FormulaTemplateValues {
  const { metadata, service } = descriptor;
  const runCommand = [
    `opt_bin/${rubyString(BINARY_NAME)}`,
    ...serviceRunArgs(service.schedule).map(rubyString),
  ].join(", ");

  return {
    desc: escapeRuby(metadata.desc),
    homepage: escapeRuby(metadata.homepage),
    version: escapeRuby(metadata.version),
    url: escapeRuby(metadata.url),
    sha256: escapeRuby(metadata.sha256),
    license: escapeRuby(metadata.license),
    binaryName: BINARY_NAME,
    runCommand,
    keepAlive: service.schedule.kind === "keep_alive",
    intervalSeconds: service.schedule.kind === "interval" ? service.schedule.seconds : 0,
    logPath: escapeRuby(service.logPath),
    errorLogPath: escapeRuby(service.errorLogPath),
    servicePath: escapeRuby(service.path),
    scheduleText: describeSchedule(service.schedule),
  };
}

export function defaultFormulaTemplatePath(): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates", "formula", `${BINARY_NAME}.rb.hbs`);
}

// =============================================================================
// RUBY STRINGS
// =============================================================================

// Escapes text for a double-quoted Ruby literal, including interpolation openers.
export function escapeRuby(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/#\{/g, "\\#{");
}

function rubyString(value: string): string {
  return `"${escapeRuby(value)}"`;
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<string, Handlebars.TemplateDelegate>();
const FORMULA_ERROR_CODE = USER_FACING_ERROR_CODES.formula;

async function loadTemplate(templatePath: string): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(templatePath);
  if (cached) return cached;

  if (!(await fse.pathExists(templatePath))) {
    throw new UserFacingError({
      code: FORMULA_ERROR_CODE,
      title: "Formula template missing.",
      message: `Formula template not found at ${templatePath}.`,
      hint: "Ensure the templates/formula directory ships with the package.",
    });
  }

  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: FORMULA_ERROR_CODE,
      title: "Formula template unreadable.",
      message: `Failed to read formula template at ${templatePath}.`,
      hint: "Check that the template file is readable.",
      cause: err,
    });
  }

  let compiled: Handlebars.TemplateDelegate;
  try {
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw new UserFacingError({
      code: FORMULA_ERROR_CODE,
      title: "Formula template invalid.",
      message: `Formula template at ${templatePath} failed to compile.`,
      hint: "Check the template syntax for errors.",
      cause: err,
    });
  }

  TEMPLATE_CACHE.set(templatePath, compiled);
  return compiled;
}

function createFormulaInvalidError(issues: string[]): UserFacingError {
  return new UserFacingError({
    code: FORMULA_ERROR_CODE,
    title: "Formula descriptor invalid.",
    message: ["Formula descriptor failed validation:", ...issues.map((i) => `- ${i}`)].join("\n"),
    hint: "Pass the release values with --release-version, --url, --sha256 and --homepage.",
    cause: new FormulaError(`Invalid formula descriptor: ${issues.join("; ")}`),
  });
}

function createFormulaRenderError(templatePath: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: FORMULA_ERROR_CODE,
    title: "Formula failed to render.",
    message: `Formula template at ${templatePath} could not be rendered.`,
    hint: "Provide values for all template placeholders.",
    cause: new FormulaError(`Unrenderable template: ${templatePath}`, cause),
  });
}

// Walk upward until package.json so compiled builds under dist/ resolve templates too.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  throw new UserFacingError({
    code: FORMULA_ERROR_CODE,
    title: "Formula templates unavailable.",
    message: `package.json not found while resolving templates from ${startDir}.`,
    hint: "Ensure the package root and templates directory are available.",
  });
}
