import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { InvalidArgumentError } from "commander";
import { afterEach, describe, expect, it } from "vitest";

import { defaultConfig } from "../core/config.js";
import { BrewError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { FakeCommandExecutor, outdatedJson } from "../maintenance/__tests__/fakes.js";

import { parsePositiveNumber, resolveRunSettings, runCommand } from "./run.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

const now = () => new Date(2025, 0, 2, 3, 4, 5);

// =============================================================================
// TESTS
// =============================================================================

describe("runCommand", () => {
  it("runs maintenance and writes the run summary and report", async () => {
    const home = makeTempDir("brew-maintainer-home-");
    const logDir = path.join(makeTempDir("brew-maintainer-logs-"), "log");
    const executor = new FakeCommandExecutor().succeed(
      "brew outdated --json",
      outdatedJson([{ name: "wget" }]),
    );
    const lines: string[] = [];

    await runCommand(
      { logDir, timeout: 2 },
      { createExecutor: () => executor, write: (line) => lines.push(line), now, env: {}, home },
    );

    expect(executor.calls).toEqual([
      "brew update",
      "brew outdated --json",
      "brew upgrade wget",
      "brew cleanup",
    ]);
    expect(executor.timeouts).toEqual([120_000]);
    expect(lines[0]).toBe(`[03:04:05] INFO  logging.init (log_dir=${logDir})`);
    expect(fs.readdirSync(logDir).sort()).toEqual([
      "brew-maintainer-20250102-030405.log",
      "brew-maintainer.log.2025-01-02",
      "last-run.json",
    ]);

    const summary = fs.readFileSync(path.join(logDir, "brew-maintainer-20250102-030405.log"), "utf8");
    expect(summary).toContain("  upgraded wget\n");
  });

  it("passes configured brew settings to the executor", async () => {
    const dir = makeTempDir("brew-maintainer-config-");
    const configPath = path.join(dir, "config.yaml");
    fs.writeFileSync(
      configPath,
      `brew_path: /opt/homebrew/bin/brew\nlog_dir: ${path.join(dir, "logs")}\ncleanup: false\nenv:\n  HOMEBREW_NO_ANALYTICS: "1"\n`,
    );
    const executor = new FakeCommandExecutor();
    const seen: Array<{ brewPath?: string; extraEnv?: Record<string, string> }> = [];

    await runCommand(
      { config: configPath },
      {
        createExecutor: (opts) => {
          seen.push({ brewPath: opts.brewPath, extraEnv: opts.extraEnv });
          return executor;
        },
        write: () => {},
        now,
        env: {},
      },
    );

    expect(seen).toEqual([
      { brewPath: "/opt/homebrew/bin/brew", extraEnv: { HOMEBREW_NO_ANALYTICS: "1" } },
    ]);
    expect(executor.calls).toEqual(["brew update", "brew outdated --json"]);
    expect(fs.existsSync(path.join(dir, "logs", "last-run.json"))).toBe(true);
  });

  it("throws a user-facing error when a required step fails", async () => {
    const logDir = makeTempDir("brew-maintainer-logs-");
    const executor = new FakeCommandExecutor().fail(
      "brew update",
      new BrewError("execution_failed", "no network"),
    );

    const error = await runCommand(
      { logDir },
      {
        createExecutor: () => executor,
        write: () => {},
        now,
        env: {},
        home: makeTempDir("brew-maintainer-home-"),
      },
    ).catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = error as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.brew);
    expect(userError.title).toBe("Failed to update reference repositories.");
    expect(userError.message).toBe(
      "Failed to update reference repositories: Error executing the brew command: no network",
    );
    expect(userError.hint).toBe(
      `See the run summary at ${path.join(logDir, "brew-maintainer-20250102-030405.log")}.`,
    );
  });

  it("repeats runs with --every until stopped", async () => {
    const logDir = makeTempDir("brew-maintainer-logs-");
    const executor = new FakeCommandExecutor();
    const controller = new AbortController();
    const lines: string[] = [];

    await runCommand(
      { logDir, every: 6 },
      {
        createExecutor: () => executor,
        write: (line) => {
          lines.push(line);
          if (line.includes("run.complete")) controller.abort();
        },
        now,
        env: {},
        home: makeTempDir("brew-maintainer-home-"),
        stopSignal: controller.signal,
      },
    );

    expect(executor.calls.filter((call) => call === "brew update")).toHaveLength(1);
    expect(lines.some((line) => line.includes("service.start (every_ms=21600000)"))).toBe(true);
    expect(lines.at(-1)).toBe("[03:04:05] INFO  service.exit");
  });
});

describe("resolveRunSettings", () => {
  it("lets flags override the config", () => {
    const config = { ...defaultConfig(), exclude: ["node"], log_dir: "/tmp/config-logs" };

    expect(
      resolveRunSettings(config, {
        timeout: 10,
        exclude: ["python", "node"],
        cleanup: false,
        dryRun: true,
        logDir: "/tmp/flag-logs",
      }),
    ).toEqual({
      upgradeTimeoutMs: 600_000,
      exclude: ["node", "python"],
      cleanup: false,
      dryRun: true,
      everyMs: null,
      logDir: "/tmp/flag-logs",
    });
  });

  it("falls back to config values", () => {
    const config = { ...defaultConfig(), cleanup: false };

    expect(resolveRunSettings(config, { cleanup: true })).toEqual({
      upgradeTimeoutMs: 300_000,
      exclude: [],
      cleanup: false,
      dryRun: false,
      everyMs: null,
      logDir: undefined,
    });
  });
});

describe("parsePositiveNumber", () => {
  it("accepts positive numbers", () => {
    expect(parsePositiveNumber("2.5")).toBe(2.5);
  });

  it("rejects zero and text", () => {
    expect(() => parsePositiveNumber("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveNumber("soon")).toThrow("Expected a positive number.");
  });
});
