import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import {
  getConfigPath,
  getStateDir,
  resolveDatabasePath,
} from "../../src/config/paths.js";

describe("getStateDir", () => {
  it("defaults to ~/.amicus", () => {
    expect(getStateDir({})).toBe(join(homedir(), ".amicus"));
  });

  it("honours AMICUS_STATE_DIR", () => {
    expect(getStateDir({ AMICUS_STATE_DIR: "/var/lib/amicus" })).toBe("/var/lib/amicus");
  });
});

describe("getConfigPath", () => {
  it("defaults to amicus.config.json in the working directory", () => {
    expect(getConfigPath({})).toBe("amicus.config.json");
  });

  it("honours AMICUS_CONFIG_PATH", () => {
    expect(getConfigPath({ AMICUS_CONFIG_PATH: "/etc/amicus.json" })).toBe("/etc/amicus.json");
  });
});

describe("resolveDatabasePath", () => {
  let root: string | null = null;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = null;
  });

  it("creates the state directory and points into it", () => {
    root = mkdtempSync(join(tmpdir(), "amicus-paths-"));
    const stateDir = join(root, "nested", "state");

    expect(resolveDatabasePath(stateDir)).toBe(join(stateDir, "amicus.db"));
    expect(existsSync(stateDir)).toBe(true);
  });

  it("passes the in-memory marker through", () => {
    expect(resolveDatabasePath(":memory:")).toBe(":memory:");
  });
});
