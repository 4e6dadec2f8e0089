import type { Command } from "commander";

import {
  ExecaBrewExecutor,
  type CommandExecutor,
  type ExecaBrewExecutorOptions,
} from "../brew/executor.js";
import { formatPackageList, parseOutdatedPackages } from "../brew/outdated.js";

import { loadConfigForCli } from "./config.js";

export type OutdatedCommandOptions = {
  config?: string;
  json?: boolean;
};

export type OutdatedCommandDeps = {
  createExecutor?: (opts: ExecaBrewExecutorOptions) => CommandExecutor;
  write?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  home?: string;
};

export function registerOutdatedCommand(program: Command): void {
  program
    .command("outdated")
    .description("List outdated formulae and casks without upgrading")
    .option("--config <path>", "Config file")
    .option("--json", "Print brew's JSON output unchanged", false)
    .action(async (opts: OutdatedCommandOptions) => {
      await outdatedCommand(opts);
    });
}

export async function outdatedCommand(
  opts: OutdatedCommandOptions,
  deps: OutdatedCommandDeps = {},
): Promise<void> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const { config } = loadConfigForCli({
    explicitConfigPath: opts.config,
    env: deps.env,
    home: deps.home,
  });

  const createExecutor =
    deps.createExecutor ?? ((o: ExecaBrewExecutorOptions) => new ExecaBrewExecutor(o));
  const executor = createExecutor({ brewPath: config.brew_path, extraEnv: config.env });
  const output = await executor.execute({ kind: "outdated", env: executor.envs() });

  if (opts.json) {
    write(output.trim());
    return;
  }

  const packages = parseOutdatedPackages(output);
  if (packages.length === 0) {
    write("Everything is up to date.");
    return;
  }

  write(formatPackageList(packages));
}
