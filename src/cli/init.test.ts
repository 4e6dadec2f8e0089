import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { initCommand } from "./init.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("initCommand", () => {
  it("writes the config under the home directory", async () => {
    const home = fs.mkdtempSync(path.join(os.tmpdir(), "brew-maintainer-home-"));
    tempDirs.push(home);
    const lines: string[] = [];
    const configPath = path.join(home, ".config", "brew-maintainer", "config.yaml");

    await initCommand({}, { env: {}, home, write: (line) => lines.push(line) });
    await initCommand({}, { env: {}, home, write: (line) => lines.push(line) });

    expect(fs.existsSync(configPath)).toBe(true);
    expect(lines).toEqual([
      `Created brew-maintainer config at ${configPath}`,
      `Edit ${configPath} to set exclusions and the upgrade timeout.`,
      `Config already exists at ${configPath}`,
    ]);
  });
});
