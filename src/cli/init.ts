import type { Command } from "commander";

import { initConfig, resolveConfigPath } from "../core/config-discovery.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Write a default config file")
    .option("--config <path>", "Where to write the config")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { config?: string; force?: boolean }) => {
      await initCommand(opts);
    });
}

export async function initCommand(
  opts: { config?: string; force?: boolean },
  deps: { env?: NodeJS.ProcessEnv; home?: string; write?: (line: string) => void } = {},
): Promise<void> {
  const write = deps.write ?? ((line: string) => console.log(line));
  try {
    const { configPath } = resolveConfigPath({
      explicitPath: opts.config,
      env: deps.env,
      home: deps.home,
    });
    const result = initConfig({ configPath, force: opts.force });

    if (result.status === "created") {
      write(`Created brew-maintainer config at ${result.configPath}`);
      write(`Edit ${result.configPath} to set exclusions and the upgrade timeout.`);
      return;
    }

    if (result.status === "overwritten") {
      write(`Overwrote brew-maintainer config at ${result.configPath}`);
      write(`Review ${result.configPath} for your settings.`);
      return;
    }

    write(`Config already exists at ${result.configPath}`);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`Init failed: ${detail}`);
    process.exitCode = 1;
  }
}
