/**
 * Homebrew formula descriptor for brew-maintainer.
 * Purpose: model the install/service contract the formula declares and check it is publishable.
 * Assumptions: release automation fills homepage, version, url and sha256 before publication.
 * Usage: validateFormulaDescriptor(buildFormulaDescriptor({ version, url, sha256 }), { requireRelease: true }).
 */

// =============================================================================
// TYPES & CONSTANTS
// =============================================================================

export const RELEASE_PLACEHOLDER = "<REPLACED_BY_GITHUB_ACTION>";
export const BINARY_NAME = "brew-maintainer";
export const DEFAULT_INTERVAL_SECONDS = 21_600;
export const DEFAULT_SERVICE_PATH = "/opt/homebrew/bin:/usr/local/bin:/usr/bin:/bin";

export type ServiceSchedule =
  | { kind: "interval"; seconds: number }
  | { kind: "keep_alive"; everyHours: number };

export type FormulaMetadata = {
  desc: string;
  homepage: string;
  version: string;
  url: string;
  sha256: string;
  license: string;
};

export type FormulaService = {
  schedule: ServiceSchedule;
  // Relative to Homebrew's var directory.
  logPath: string;
  errorLogPath: string;
  path: string;
};

export type FormulaDescriptor = {
  metadata: FormulaMetadata;
  service: FormulaService;
};

export type FormulaInput = Partial<FormulaMetadata> & {
  schedule?: ServiceSchedule;
  servicePath?: string;
};

export const METADATA_FIELDS = [
  "desc",
  "homepage",
  "version",
  "url",
  "sha256",
  "license",
] as const satisfies ReadonlyArray<keyof FormulaMetadata>;

export const RELEASE_FIELDS = ["homepage", "version", "url", "sha256"] as const satisfies ReadonlyArray<
  keyof FormulaMetadata
>;

const DEFAULT_METADATA: FormulaMetadata = {
  desc: "Automated Homebrew maintenance tool (update, upgrade, cleanup with logs)",
  homepage: `https://github.com/${RELEASE_PLACEHOLDER}`,
  version: RELEASE_PLACEHOLDER,
  url: RELEASE_PLACEHOLDER,
  sha256: RELEASE_PLACEHOLDER,
  license: "MIT",
};

// =============================================================================
// BUILD
// =============================================================================

export function buildFormulaDescriptor(input: FormulaInput = {}): FormulaDescriptor {
  const metadata: FormulaMetadata = { ...DEFAULT_METADATA };
  for (const field of METADATA_FIELDS) {
    const value = input[field]?.trim();
    if (value) metadata[field] = value;
  }

  return {
    metadata,
    service: {
      schedule: input.schedule ?? { kind: "interval", seconds: DEFAULT_INTERVAL_SECONDS },
      logPath: `log/${BINARY_NAME}.log`,
      errorLogPath: `log/${BINARY_NAME}.err.log`,
      path: input.servicePath?.trim() || DEFAULT_SERVICE_PATH,
    },
  };
}

/** Arguments after the binary in the service `run` array. */
export function serviceRunArgs(schedule: ServiceSchedule): string[] {
  return schedule.kind === "keep_alive" ? ["run", "--every", String(schedule.everyHours)] : [];
}

export function describeSchedule(schedule: ServiceSchedule): string {
  if (schedule.kind === "keep_alive") {
    return `continuously (one run every ${formatHours(schedule.everyHours * 3600)})`;
  }
  return `every ${formatHours(schedule.seconds)}`;
}

function formatHours(seconds: number): string {
  if (seconds % 3600 === 0) {
    const hours = seconds / 3600;
    return hours === 1 ? "hour" : `${hours} hours`;
  }
  if (seconds % 60 === 0) {
    const minutes = seconds / 60;
    return minutes === 1 ? "minute" : `${minutes} minutes`;
  }
  return `${seconds} seconds`;
}

// =============================================================================
// VALIDATION
// =============================================================================

const SHA256_PATTERN = /^[0-9a-f]{64}$/i;
const VERSION_PATTERN = /^v?\d+(\.\d+)*([-+.][0-9A-Za-z.-]+)?$/;

export function validateFormulaMetadata(
  metadata: Partial<FormulaMetadata>,
  opts: { requireRelease?: boolean } = {},
): string[] {
  const issues: string[] = [];

  for (const field of METADATA_FIELDS) {
    const value = metadata[field];
    if (value === undefined || value.trim().length === 0) {
      issues.push(`${field}: must be a non-empty string`);
      continue;
    }

    if (value.includes(RELEASE_PLACEHOLDER)) {
      if (opts.requireRelease) {
        issues.push(`${field}: still holds the release placeholder`);
      }
      continue;
    }

    const problem = checkMetadataValue(field, value);
    if (problem) issues.push(`${field}: ${problem}`);
  }

  return issues;
}

function checkMetadataValue(field: keyof FormulaMetadata, value: string): string | null {
  switch (field) {
    case "sha256":
      return SHA256_PATTERN.test(value) ? null : "must be 64 hexadecimal characters";
    case "url":
    case "homepage":
      return isHttpsUrl(value) ? null : "must be an https URL";
    case "version":
      return VERSION_PATTERN.test(value) ? null : `"${value}" is not a version`;
    default:
      return null;
  }
}

export function validateFormulaDescriptor(
  descriptor: FormulaDescriptor,
  opts: { requireRelease?: boolean } = {},
): string[] {
  const issues = validateFormulaMetadata(descriptor.metadata, opts);
  const { service } = descriptor;

  if (service.schedule.kind === "interval") {
    const { seconds } = service.schedule;
    if (!Number.isInteger(seconds) || seconds <= 0) {
      issues.push("service.interval: must be a positive whole number of seconds");
    }
  } else if (!(service.schedule.everyHours > 0)) {
    issues.push("service.every: must be a positive number of hours");
  }

  for (const [key, value] of [
    ["service.log_path", service.logPath],
    ["service.error_log_path", service.errorLogPath],
  ] as const) {
    if (!isManagedLogPath(value)) {
      issues.push(`${key}: must be a file under var/log`);
    }
  }
  if (service.logPath === service.errorLogPath) {
    issues.push("service.error_log_path: must differ from service.log_path");
  }

  issues.push(...validateServicePath(service.path));
  return issues;
}

export function validateServicePath(value: string): string[] {
  const entries = value.split(":");
  if (value.trim().length === 0) {
    return ["service.PATH: must not be empty"];
  }
  return entries
    .filter((entry) => !entry.startsWith("/"))
    .map((entry) => `service.PATH: "${entry}" is not an absolute directory`);
}

export function isManagedLogPath(value: string): boolean {
  const segments = value.split("/");
  return (
    segments.length >= 2 &&
    segments[0] === "log" &&
    segments.every((segment) => segment.length > 0 && segment !== "." && segment !== "..")
  );
}

function isHttpsUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" && url.hostname.length > 0;
  } catch {
    return false;
  }
}
