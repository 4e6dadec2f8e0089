import fs from "node:fs";
import path from "node:path";

import { DEFAULT_BREW_PATH, DEFAULT_UPGRADE_TIMEOUT_MINUTES } from "./config.js";
import { CONFIG_ENV_VAR, defaultConfigPath } from "./paths.js";

export type ConfigSource = "explicit" | "env" | "default";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveConfigPath(args: {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
} = {}): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const fromEnv = (args.env ?? process.env)[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    return { configPath: path.resolve(fromEnv), source: "env" };
  }

  return { configPath: defaultConfigPath(args.home), source: "default" };
}

export function initConfig(args: { configPath: string; force?: boolean }): InitResult {
  const configPath = path.resolve(args.configPath);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

export function buildDefaultConfig(): string {
  return [
    "# brew-maintainer config. Command-line flags override these values.",
    `upgrade_timeout_minutes: ${DEFAULT_UPGRADE_TIMEOUT_MINUTES}`,
    "",
    "# Formulae or casks never upgraded automatically.",
    "exclude: []",
    "",
    "cleanup: true",
    "",
    "# Defaults to /opt/homebrew/var/log, or /usr/local/var/log on Intel Macs.",
    "# log_dir: /usr/local/var/log",
    "",
    `brew_path: ${DEFAULT_BREW_PATH}`,
    "",
    "# Extra environment variables passed to brew.",
    "env: {}",
    "",
  ].join("\n");
}
