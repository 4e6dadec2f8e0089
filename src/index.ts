import { Command } from "commander";

import { registerFormulaCommand } from "./cli/formula.js";
import { registerInitCommand } from "./cli/init.js";
import { registerOutdatedCommand } from "./cli/outdated.js";
import { printCliError } from "./cli/output.js";
import { registerRunCommand } from "./cli/run.js";
import { registerStatusCommand } from "./cli/status.js";

export const PROGRAM_VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("brew-maintainer")
    .description("Keep Homebrew updated, upgraded and clean, with logs of every run")
    .version(PROGRAM_VERSION);

  registerRunCommand(program);
  registerOutdatedCommand(program);
  registerStatusCommand(program);
  registerInitCommand(program);
  registerFormulaCommand(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    printCliError(err, { debug: argv.includes("--debug") });
    process.exitCode = 1;
  }
}
