import { describe, expect, it } from "vitest";

import { parseOutdatedPackages } from "../brew/outdated.js";
import { BrewError } from "../core/errors.js";

import { FakeCommandExecutor, RecordingLogger, fixedClock, outdatedJson } from "./__tests__/fakes.js";
import { BrewMaintainer, DEFAULT_UPGRADE_TIMEOUT_MS, runMaintenance } from "./maintainer.js";

describe("BrewMaintainer", () => {
  it("upgrades each package with the given timeout", async () => {
    const executor = new FakeCommandExecutor();
    const maintainer = new BrewMaintainer(executor);
    const packages = parseOutdatedPackages(outdatedJson([{ name: "wget" }, { name: "jq" }]));

    const outcome = await maintainer.upgradePackagesWithTimeout(packages, 60_000);

    expect(outcome).toEqual({ upgraded: ["wget", "jq"], failed: [], skipped: [] });
    expect(executor.calls).toEqual(["brew upgrade wget", "brew upgrade jq"]);
    expect(executor.timeouts).toEqual([60_000, 60_000]);
  });

  it("skips excluded packages before pinned ones", async () => {
    const executor = new FakeCommandExecutor();
    const maintainer = new BrewMaintainer(executor);
    const packages = parseOutdatedPackages(
      outdatedJson([
        { name: "node", pinned: true },
        { name: "python", pinned: true },
        { name: "git" },
      ]),
    );

    const outcome = await maintainer.upgradePackagesWithTimeout(packages, 1000, {
      exclude: ["node", "git"],
    });

    expect(outcome.skipped).toEqual([
      { name: "node", reason: "excluded" },
      { name: "python", reason: "pinned" },
      { name: "git", reason: "excluded" },
    ]);
    expect(executor.calls).toEqual([]);
  });

  it("records non-brew failures as execution failures", async () => {
    const executor = new FakeCommandExecutor().fail("brew upgrade wget", new Error("spawn EIO"));
    const maintainer = new BrewMaintainer(executor);
    const packages = parseOutdatedPackages(outdatedJson([{ name: "wget" }]));

    const outcome = await maintainer.upgradePackagesWithTimeout(packages, 1000);

    expect(outcome.failed).toEqual([
      { name: "wget", reason: "execution_failed", message: "spawn EIO" },
    ]);
  });
});

describe("runMaintenance", () => {
  it("runs update, outdated, upgrade and cleanup in order", async () => {
    const executor = new FakeCommandExecutor()
      .succeed("brew update", "Already up-to-date.\n")
      .succeed("brew outdated --json", outdatedJson([{ name: "wget" }, { name: "jq" }]));
    const logger = new RecordingLogger();

    const report = await runMaintenance(new BrewMaintainer(executor), {
      logger,
      now: fixedClock(),
    });

    expect(executor.calls).toEqual([
      "brew update",
      "brew outdated --json",
      "brew upgrade wget",
      "brew upgrade jq",
      "brew cleanup",
    ]);
    expect(executor.timeouts).toEqual([DEFAULT_UPGRADE_TIMEOUT_MS, DEFAULT_UPGRADE_TIMEOUT_MS]);
    expect(report.status).toBe("completed");
    expect(report.startedAt).toBe("2025-01-02T03:04:05.000Z");
    expect(report.finishedAt).toBe("2025-01-02T03:04:06.000Z");
    expect(report.steps.map((step) => [step.step, step.status])).toEqual([
      ["update", "completed"],
      ["outdated", "completed"],
      ["upgrade", "completed"],
      ["cleanup", "completed"],
    ]);
    expect(report.upgraded).toEqual(["wget", "jq"]);
    expect(report.error).toBeUndefined();
    expect(logger.types()).toEqual([
      "run.start",
      "step.start",
      "step.complete",
      "step.start",
      "step.complete",
      "outdated.found",
      "step.start",
      "upgrade.start",
      "upgrade.complete",
      "upgrade.start",
      "upgrade.complete",
      "step.complete",
      "step.start",
      "step.complete",
      "run.complete",
    ]);
    expect(logger.events[2]?.payload).toEqual({ step: "update", output: "Already up-to-date." });
  });

  it("keeps going when a package asks for input", async () => {
    const executor = new FakeCommandExecutor()
      .succeed("brew outdated --json", outdatedJson([{ name: "wget" }, { name: "jq" }]))
      .fail("brew upgrade wget", new BrewError("input_requested", "Do you want to proceed? [y/N]"));
    const logger = new RecordingLogger();

    const report = await runMaintenance(new BrewMaintainer(executor), { logger });

    expect(report.status).toBe("completed");
    expect(report.upgraded).toEqual(["jq"]);
    expect(report.failed).toEqual([
      {
        name: "wget",
        reason: "input_requested",
        message: "Error Input request cannot be fulfilled: Do you want to proceed? [y/N]",
      },
    ]);
    expect(report.steps[2]).toEqual({
      step: "upgrade",
      command: "brew upgrade",
      status: "failed",
      error: "1 package(s) failed to upgrade",
    });
    expect(executor.calls.at(-1)).toBe("brew cleanup");

    const prompt = logger.events.find((event) => event.type === "upgrade.input_requested");
    expect(prompt?.level).toBe("warn");
    expect(prompt?.payload?.name).toBe("wget");
  });

  it("stops after a failed update", async () => {
    const executor = new FakeCommandExecutor().fail(
      "brew update",
      new BrewError("execution_failed", "fatal: unable to access repository"),
    );
    const logger = new RecordingLogger();

    const report = await runMaintenance(new BrewMaintainer(executor), { logger });

    expect(executor.calls).toEqual(["brew update"]);
    expect(report.status).toBe("failed");
    expect(report.error).toEqual({
      step: "update",
      message: "Failed to update reference repositories",
      detail: "Error executing the brew command: fatal: unable to access repository",
    });
    expect(report.steps).toEqual([
      {
        step: "update",
        command: "brew update",
        status: "failed",
        error: "Error executing the brew command: fatal: unable to access repository",
      },
    ]);
    expect(logger.types().at(-1)).toBe("run.fail");
  });

  it("fails the run when brew outdated prints something other than JSON", async () => {
    const executor = new FakeCommandExecutor().succeed("brew outdated --json", "Warning: not json");

    const report = await runMaintenance(new BrewMaintainer(executor));

    expect(report.status).toBe("failed");
    expect(report.error).toEqual({
      step: "outdated",
      message: "Failed in finding outdated packages",
      detail: "Error executing the brew command: brew outdated returned invalid JSON",
    });
    expect(executor.calls).toEqual(["brew update", "brew outdated --json"]);
  });

  it("fails the run when cleanup fails", async () => {
    const executor = new FakeCommandExecutor().fail(
      "brew cleanup",
      new BrewError("execution_failed", "Permission denied"),
    );

    const report = await runMaintenance(new BrewMaintainer(executor));

    expect(report.status).toBe("failed");
    expect(report.error?.step).toBe("cleanup");
    expect(report.error?.message).toBe("Failed to cleanup");
    expect(report.steps.map((step) => step.status)).toEqual([
      "completed",
      "completed",
      "completed",
      "failed",
    ]);
  });

  it("upgrades nothing and skips cleanup in a dry run", async () => {
    const executor = new FakeCommandExecutor().succeed(
      "brew outdated --json",
      outdatedJson([{ name: "wget" }]),
    );
    const logger = new RecordingLogger();

    const report = await runMaintenance(new BrewMaintainer(executor), { dryRun: true, logger });

    expect(executor.calls).toEqual(["brew update", "brew outdated --json"]);
    expect(report.dryRun).toBe(true);
    expect(report.skipped).toEqual([{ name: "wget", reason: "dry_run" }]);
    expect(report.steps.at(-1)).toEqual({
      step: "cleanup",
      command: "brew cleanup",
      status: "skipped",
    });
    expect(logger.events.find((event) => event.type === "step.skip")?.payload).toEqual({
      step: "cleanup",
      reason: "dry_run",
    });
  });

  it("skips cleanup when disabled", async () => {
    const executor = new FakeCommandExecutor();
    const logger = new RecordingLogger();

    const report = await runMaintenance(new BrewMaintainer(executor), { cleanup: false, logger });

    expect(executor.calls).toEqual(["brew update", "brew outdated --json"]);
    expect(report.status).toBe("completed");
    expect(report.steps.at(-1)?.status).toBe("skipped");
    expect(logger.events.find((event) => event.type === "step.skip")?.payload?.reason).toBe(
      "disabled",
    );
  });
});
