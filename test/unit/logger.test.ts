import { describe, it, expect } from "vitest";
import { createLogger, createSilentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("tags records with the service name", () => {
    const logger = createLogger({ level: "info", json: true });
    expect(logger.bindings()).toEqual({ service: "amicus" });
  });

  it("creates a child logger that keeps the level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ channel: "telegram" });
    expect(child.level).toBe("warn");
    expect(child.bindings()).toEqual({ service: "amicus", channel: "telegram" });
  });
});

describe("createSilentLogger", () => {
  it("drops everything", () => {
    const logger = createSilentLogger();
    expect(logger.level).toBe("silent");
    expect(logger.isLevelEnabled("error")).toBe(false);
  });
});
