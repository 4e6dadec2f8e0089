// brew subcommands issued by a maintenance run.
// Each command carries the environment its child process receives.

export type BrewEnv = Record<string, string>;

export type BrewCommand =
  | { kind: "update"; env: BrewEnv }
  | { kind: "outdated"; env: BrewEnv }
  | { kind: "upgrade"; packageName: string; env: BrewEnv }
  | { kind: "cleanup"; env: BrewEnv };

export type BrewCommandKind = BrewCommand["kind"];

export function brewCommandArgs(cmd: BrewCommand): string[] {
  switch (cmd.kind) {
    case "update":
      return ["update"];
    case "outdated":
      return ["outdated", "--json"];
    case "upgrade":
      return ["upgrade", cmd.packageName];
    case "cleanup":
      return ["cleanup"];
  }
}

export function formatBrewCommand(cmd: BrewCommand): string {
  return ["brew", ...brewCommandArgs(cmd)].join(" ");
}
