// Read a rendered formula back into its declared values so a published file can be checked
// without the descriptor that produced it.

import {
  METADATA_FIELDS,
  RELEASE_PLACEHOLDER,
  isManagedLogPath,
  validateFormulaMetadata,
  validateServicePath,
  type FormulaMetadata,
  type ServiceSchedule,
} from "./descriptor.js";

export type FormulaInspection = {
  metadata: Partial<FormulaMetadata>;
  schedule: ServiceSchedule | null;
  logPath: string | null;
  errorLogPath: string | null;
  servicePath: string | null;
  issues: string[];
};

const SCALAR_LINE = /^\s*(desc|homepage|version|url|sha256|license)\s+"((?:[^"\\]|\\.)*)"\s*$/;
const INTERVAL_LINE = /^\s*interval\s+(\d+)\s*$/;
const KEEP_ALIVE_LINE = /^\s*keep_alive\s+true\s*$/;
const EVERY_ARGS = /"--every",\s*"([\d.]+)"/;
const LOG_PATH_LINE = /^\s*log_path\s+var\/"([^"]*)"\s*$/;
const ERROR_LOG_PATH_LINE = /^\s*error_log_path\s+var\/"([^"]*)"\s*$/;
const SERVICE_PATH_LINE = /^\s*environment_variables\s+PATH:\s+"([^"]*)"\s*$/;

export function inspectFormulaSource(source: string): FormulaInspection {
  const metadata: Partial<FormulaMetadata> = {};
  let interval: number | null = null;
  let keepAlive = false;
  let everyHours: number | null = null;
  let logPath: string | null = null;
  let errorLogPath: string | null = null;
  let servicePath: string | null = null;
  let installsBinary = false;
  let hasWorkingDir = false;

  for (const line of source.split(/\r?\n/)) {
    const scalar = SCALAR_LINE.exec(line);
    if (scalar) {
      const field = scalar[1];
      if (isMetadataField(field)) {
        metadata[field] = unescapeRuby(scalar[2]);
      }
      continue;
    }

    const intervalMatch = INTERVAL_LINE.exec(line);
    if (intervalMatch) interval = Number(intervalMatch[1]);
    if (KEEP_ALIVE_LINE.test(line)) keepAlive = true;

    const every = EVERY_ARGS.exec(line);
    if (every) everyHours = Number(every[1]);

    logPath = LOG_PATH_LINE.exec(line)?.[1] ?? logPath;
    errorLogPath = ERROR_LOG_PATH_LINE.exec(line)?.[1] ?? errorLogPath;
    servicePath = SERVICE_PATH_LINE.exec(line)?.[1] ?? servicePath;

    if (/^\s*bin\.install\s+"brew-maintainer"\s*$/.test(line)) installsBinary = true;
    if (/^\s*working_dir\s+var\s*$/.test(line)) hasWorkingDir = true;
  }

  const schedule: ServiceSchedule | null = keepAlive
    ? { kind: "keep_alive", everyHours: everyHours ?? 0 }
    : interval !== null
      ? { kind: "interval", seconds: interval }
      : null;

  const issues = validateFormulaMetadata(metadata, { requireRelease: true });

  if (!installsBinary) issues.push('install: must run bin.install "brew-maintainer"');
  if (!schedule) issues.push("service: declares neither an interval nor keep_alive");
  if (schedule?.kind === "interval" && schedule.seconds <= 0) {
    issues.push("service.interval: must be a positive whole number of seconds");
  }
  if (schedule?.kind === "keep_alive" && !(schedule.everyHours > 0)) {
    issues.push('service.run: keep_alive services must pass "--every <hours>"');
  }
  if (logPath === null || !isManagedLogPath(logPath)) {
    issues.push("service.log_path: must be a file under var/log");
  }
  if (errorLogPath === null || !isManagedLogPath(errorLogPath)) {
    issues.push("service.error_log_path: must be a file under var/log");
  }
  if (logPath !== null && logPath === errorLogPath) {
    issues.push("service.error_log_path: must differ from service.log_path");
  }
  if (!hasWorkingDir) issues.push("service.working_dir: must be var");
  if (servicePath === null) {
    issues.push("service.PATH: missing");
  } else {
    issues.push(...validateServicePath(servicePath));
  }
  if (source.includes(RELEASE_PLACEHOLDER) && !issues.some((i) => i.includes("placeholder"))) {
    issues.push("formula: still contains the release placeholder");
  }

  return { metadata, schedule, logPath, errorLogPath, servicePath, issues };
}

function isMetadataField(value: string | undefined): value is keyof FormulaMetadata {
  return METADATA_FIELDS.some((field) => field === value);
}

function unescapeRuby(value: string): string {
  return value.replace(/\\(.)/g, "$1");
}
