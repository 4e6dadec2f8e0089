/**
 * brew process execution.
 * Purpose: run brew subcommands, capturing output or watching for prompts under a deadline.
 * Assumptions: brew never receives stdin; a prompt for input means the run cannot proceed.
 * Usage: new ExecaBrewExecutor({ brewPath }).executeWithTimeout(cmd, 5 * 60_000).
 */

import type { Readable } from "node:stream";
import readline from "node:readline";

import { execa, type ExecaChildProcess } from "execa";

import { BrewError } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import { setLongTimeout } from "../core/utils.js";

import { brewCommandArgs, formatBrewCommand, type BrewCommand, type BrewEnv } from "./command.js";
import { isWaitingForInput } from "./input-detection.js";

// =============================================================================
// TYPES
// =============================================================================

export interface CommandExecutor {
  /** Run to completion and return stdout; rejects with a BrewError on failure. */
  execute(cmd: BrewCommand): Promise<string>;
  envs(): BrewEnv;
  executeWithTimeout(cmd: BrewCommand, timeoutMs: number): Promise<void>;
}

export type ExecaBrewExecutorOptions = {
  brewPath?: string;
  extraEnv?: BrewEnv;
  processEnv?: NodeJS.ProcessEnv;
  logger?: EventLogger;
};

// =============================================================================
// EXECA EXECUTOR
// =============================================================================

const STDERR_TAIL_LINES = 20;

export class ExecaBrewExecutor implements CommandExecutor {
  private readonly brewPath: string;
  private readonly extraEnv: BrewEnv;
  private readonly processEnv: NodeJS.ProcessEnv;
  private readonly logger?: EventLogger;

  constructor(opts: ExecaBrewExecutorOptions = {}) {
    this.brewPath = opts.brewPath ?? "brew";
    this.extraEnv = opts.extraEnv ?? {};
    this.processEnv = opts.processEnv ?? process.env;
    this.logger = opts.logger;
  }

  envs(): BrewEnv {
    const env: BrewEnv = {};
    const { HOME, PATH } = this.processEnv;
    if (HOME) env.HOME = HOME;
    if (PATH) env.PATH = PATH;
    return { ...env, ...this.extraEnv, NONINTERACTIVE: "1" };
  }

  async execute(cmd: BrewCommand): Promise<string> {
    this.logger?.log({
      type: "brew.exec",
      level: "debug",
      payload: { command: formatBrewCommand(cmd) },
    });

    try {
      const result = await execa(this.brewPath, brewCommandArgs(cmd), {
        env: cmd.env,
        extendEnv: false,
        stdin: "ignore",
      });
      return result.stdout;
    } catch (err) {
      throw toExecutionError(err);
    }
  }

  executeWithTimeout(cmd: BrewCommand, timeoutMs: number): Promise<void> {
    let subprocess: ExecaChildProcess;
    try {
      subprocess = execa(this.brewPath, brewCommandArgs(cmd), {
        env: cmd.env,
        extendEnv: false,
        stdin: "ignore",
        buffer: false,
        reject: false,
      });
    } catch (err) {
      return Promise.reject(toExecutionError(err));
    }

    this.logger?.log({
      type: "brew.exec",
      level: "debug",
      payload: {
        command: formatBrewCommand(cmd),
        pid: subprocess.pid ?? null,
        timeout_ms: timeoutMs,
      },
    });

    return watchSubprocess(subprocess, Math.max(0, timeoutMs));
  }
}

// =============================================================================
// PROCESS WATCHING
// =============================================================================

export type WatchedSubprocess = Pick<
  ExecaChildProcess,
  "stdout" | "stderr" | "kill" | "exitCode" | "then"
>;

export function watchSubprocess(subprocess: WatchedSubprocess, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const stderrTail: string[] = [];
    const readers: readline.Interface[] = [];
    let settled = false;
    let inputRequested = false;

    const finish = (error?: BrewError): void => {
      if (settled) return;
      settled = true;
      cancelTimer();
      for (const reader of readers) reader.close();
      if (subprocess.exitCode === null) {
        subprocess.kill("SIGKILL");
      }
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const onLine = (line: string, fromStderr: boolean): void => {
      if (fromStderr) {
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
      }
      // A prompt wins over whatever the process does next.
      if (!inputRequested && isWaitingForInput(line)) {
        inputRequested = true;
        finish(new BrewError("input_requested", line.trim()));
      }
    };

    watchLines(subprocess.stdout, (line) => onLine(line, false), readers);
    watchLines(subprocess.stderr, (line) => onLine(line, true), readers);

    const cancelTimer = setLongTimeout(() => finish(new BrewError("timeout")), timeoutMs);

    void subprocess.then(
      (result) => {
        // Let pending line events flush so a late prompt still takes priority.
        setImmediate(() => {
          if (result.exitCode === 0 && !result.failed) {
            finish();
            return;
          }
          // No exit code: brew never started, so the spawn error is the detail.
          if (result.exitCode === undefined || result.exitCode === null) {
            finish(toExecutionError(result));
            return;
          }
          const detail = stderrTail.join("\n").trim();
          finish(
            new BrewError(
              "execution_failed",
              detail || `Process exited with code: ${result.exitCode}`,
            ),
          );
        });
      },
      (err: unknown) => {
        setImmediate(() => finish(toExecutionError(err)));
      },
    );
  });
}

function watchLines(
  stream: Readable | null,
  onLine: (line: string) => void,
  readers: readline.Interface[],
): void {
  if (!stream) return;
  const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
  reader.on("line", onLine);
  readers.push(reader);
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

function toExecutionError(err: unknown): BrewError {
  if (err instanceof BrewError) return err;

  if (err && typeof err === "object") {
    const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr.trim() : "";
    if (stderr) return new BrewError("execution_failed", stderr, err);

    const shortMessage =
      "shortMessage" in err && typeof err.shortMessage === "string" ? err.shortMessage : "";
    if (shortMessage) return new BrewError("execution_failed", shortMessage, err);
  }

  const message = err instanceof Error ? err.message : String(err);
  return new BrewError("execution_failed", message, err);
}
