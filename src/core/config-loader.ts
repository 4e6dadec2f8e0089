import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import {
  MaintainerConfigSchema,
  defaultConfig,
  formatConfigIssues,
  type MaintainerConfig,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const CONFIG_INIT_HINT = "Run `brew-maintainer init` to write a default config.";
const CONFIG_EDIT_HINT = "Fix the listed keys and run the command again.";

/**
 * Load and validate a YAML config file.
 *
 * When `required` is false a missing file yields the defaults; otherwise it is an error.
 */
export function loadMaintainerConfig(
  configPath: string,
  opts: { required?: boolean } = {},
): MaintainerConfig {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    if (opts.required ?? true) {
      throw createConfigMissingError(resolved);
    }
    return defaultConfig();
  }

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (err) {
    throw createConfigReadError(resolved, err);
  }

  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (err) {
    throw createConfigParseError(resolved, err);
  }

  // An empty document parses to null; treat it as "all defaults".
  const parsed = MaintainerConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw createConfigInvalidError(resolved, formatConfigIssues(parsed.error.issues), parsed.error);
  }

  return parsed.data;
}

// =============================================================================
// ERRORS
// =============================================================================

function createConfigMissingError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config file not found at ${configPath}.`,
    hint: CONFIG_INIT_HINT,
    cause: new ConfigError(`Missing config: ${configPath}`),
  });
}

function createConfigReadError(configPath: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config unreadable.",
    message: `Failed to read config at ${configPath}.`,
    hint: "Check the file permissions.",
    cause: new ConfigError(`Unreadable config: ${configPath}`, cause),
  });
}

function createConfigParseError(configPath: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config is not valid YAML.",
    message: `Failed to parse YAML in ${configPath}.`,
    hint: CONFIG_EDIT_HINT,
    cause: new ConfigError(`Invalid YAML: ${configPath}`, cause),
  });
}

function createConfigInvalidError(
  configPath: string,
  issues: string[],
  cause: unknown,
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: [`Config at ${configPath} failed validation:`, ...issues.map((i) => `- ${i}`)].join(
      "\n",
    ),
    hint: CONFIG_EDIT_HINT,
    cause: new ConfigError(`Invalid config: ${configPath}`, cause),
  });
}
