import { describe, expect, it } from "vitest";

import {
  DEFAULT_SERVICE_PATH,
  RELEASE_PLACEHOLDER,
  buildFormulaDescriptor,
  describeSchedule,
  serviceRunArgs,
  validateFormulaDescriptor,
  validateFormulaMetadata,
  type FormulaDescriptor,
} from "./descriptor.js";

const RELEASE = {
  homepage: "https://example.com/brew-maintainer",
  version: "1.2.0",
  url: "https://example.com/brew-maintainer-1.2.0.tar.gz",
  sha256: "a".repeat(64),
};

describe("buildFormulaDescriptor", () => {
  it("fills release fields with the placeholder by default", () => {
    const descriptor = buildFormulaDescriptor();

    expect(descriptor.metadata).toEqual({
      desc: "Automated Homebrew maintenance tool (update, upgrade, cleanup with logs)",
      homepage: `https://github.com/${RELEASE_PLACEHOLDER}`,
      version: RELEASE_PLACEHOLDER,
      url: RELEASE_PLACEHOLDER,
      sha256: RELEASE_PLACEHOLDER,
      license: "MIT",
    });
    expect(descriptor.service).toEqual({
      schedule: { kind: "interval", seconds: 21_600 },
      logPath: "log/brew-maintainer.log",
      errorLogPath: "log/brew-maintainer.err.log",
      path: DEFAULT_SERVICE_PATH,
    });
  });

  it("trims provided values and ignores blank ones", () => {
    const descriptor = buildFormulaDescriptor({ version: " 1.2.0 ", url: "  ", servicePath: "" });

    expect(descriptor.metadata.version).toBe("1.2.0");
    expect(descriptor.metadata.url).toBe(RELEASE_PLACEHOLDER);
    expect(descriptor.service.path).toBe(DEFAULT_SERVICE_PATH);
  });
});

describe("service schedule", () => {
  it("passes --every only to keep-alive services", () => {
    expect(serviceRunArgs({ kind: "interval", seconds: 3600 })).toEqual([]);
    expect(serviceRunArgs({ kind: "keep_alive", everyHours: 6 })).toEqual(["run", "--every", "6"]);
  });

  it("describes the cadence for the caveats", () => {
    expect(describeSchedule({ kind: "interval", seconds: 21_600 })).toBe("every 6 hours");
    expect(describeSchedule({ kind: "interval", seconds: 3600 })).toBe("every hour");
    expect(describeSchedule({ kind: "interval", seconds: 1800 })).toBe("every 30 minutes");
    expect(describeSchedule({ kind: "interval", seconds: 90 })).toBe("every 90 seconds");
    expect(describeSchedule({ kind: "keep_alive", everyHours: 6 })).toBe(
      "continuously (one run every 6 hours)",
    );
  });
});

describe("validateFormulaMetadata", () => {
  it("accepts placeholders unless a release is required", () => {
    const { metadata } = buildFormulaDescriptor();

    expect(validateFormulaMetadata(metadata)).toEqual([]);
    expect(validateFormulaMetadata(metadata, { requireRelease: true })).toEqual([
      "homepage: still holds the release placeholder",
      "version: still holds the release placeholder",
      "url: still holds the release placeholder",
      "sha256: still holds the release placeholder",
    ]);
  });

  it("checks the shape of release values", () => {
    const { metadata } = buildFormulaDescriptor({
      homepage: "http://example.com",
      version: "latest",
      url: "not a url",
      sha256: "abc123",
    });

    expect(validateFormulaMetadata(metadata, { requireRelease: true })).toEqual([
      "homepage: must be an https URL",
      'version: "latest" is not a version',
      "url: must be an https URL",
      "sha256: must be 64 hexadecimal characters",
    ]);
  });

  it("requires every field to be present", () => {
    expect(validateFormulaMetadata({ ...RELEASE, desc: " ", license: "MIT" })).toEqual([
      "desc: must be a non-empty string",
    ]);
  });
});

describe("validateFormulaDescriptor", () => {
  it("passes a complete release descriptor", () => {
    const descriptor = buildFormulaDescriptor(RELEASE);
    expect(validateFormulaDescriptor(descriptor, { requireRelease: true })).toEqual([]);
  });

  it("flags unusable service settings", () => {
    const base = buildFormulaDescriptor(RELEASE);
    const descriptor: FormulaDescriptor = {
      metadata: base.metadata,
      service: {
        schedule: { kind: "interval", seconds: 0 },
        logPath: "../brew-maintainer.log",
        errorLogPath: "../brew-maintainer.log",
        path: "bin:/usr/bin",
      },
    };

    expect(validateFormulaDescriptor(descriptor)).toEqual([
      "service.interval: must be a positive whole number of seconds",
      "service.log_path: must be a file under var/log",
      "service.error_log_path: must be a file under var/log",
      "service.error_log_path: must differ from service.log_path",
      'service.PATH: "bin" is not an absolute directory',
    ]);
  });

  it("requires a positive keep-alive cadence", () => {
    const descriptor = buildFormulaDescriptor({
      ...RELEASE,
      schedule: { kind: "keep_alive", everyHours: 0 },
    });

    expect(validateFormulaDescriptor(descriptor)).toEqual([
      "service.every: must be a positive number of hours",
    ]);
  });
});
