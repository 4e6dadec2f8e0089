import type { MaintainerConfig } from "../core/config.js";
import { resolveConfigPath, type ConfigSource } from "../core/config-discovery.js";
import { loadMaintainerConfig } from "../core/config-loader.js";

export function loadConfigForCli(args: {
  explicitConfigPath?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
} = {}): {
  config: MaintainerConfig;
  configPath: string;
  source: ConfigSource;
} {
  const resolved = resolveConfigPath({
    explicitPath: args.explicitConfigPath,
    env: args.env,
    home: args.home,
  });

  // Only a path the user named has to exist; the default location falls back to defaults.
  const config = loadMaintainerConfig(resolved.configPath, {
    required: resolved.source !== "default",
  });

  return { config, configPath: resolved.configPath, source: resolved.source };
}
