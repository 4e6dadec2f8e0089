import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// Homebrew's variable-data log directory differs between Apple silicon and Intel prefixes.
export const APPLE_SILICON_LOG_DIR = "/opt/homebrew/var/log";
export const INTEL_LOG_DIR = "/usr/local/var/log";

export const CONFIG_DIR_NAME = "brew-maintainer";
export const CONFIG_FILE_NAME = "config.yaml";
export const CONFIG_ENV_VAR = "BREW_MAINTAINER_CONFIG";

export const LAST_RUN_FILE = "last-run.json";

export function resolveLogDir(args: {
  override?: string;
  exists?: (dir: string) => boolean;
} = {}): string {
  if (args.override) {
    return path.resolve(args.override);
  }

  const exists = args.exists ?? fs.existsSync;
  return exists(APPLE_SILICON_LOG_DIR) ? APPLE_SILICON_LOG_DIR : INTEL_LOG_DIR;
}

export function ensureLogDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function defaultConfigPath(home: string = os.homedir()): string {
  return path.join(home, ".config", CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function lastRunPath(logDir: string): string {
  return path.join(logDir, LAST_RUN_FILE);
}
