import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ConfigError,
  loadConfig,
  parseConfigText,
  substituteEnv,
} from "../../src/config/loader.js";
import { DEFAULT_PERSONA_ID, parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-token";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("token: ${env:TEST_TOKEN}")).toBe("token: test-token");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TOKEN}:${env:TEST_PORT}")).toBe("test-token:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills defaults from an empty object", () => {
    const config = parseConfig({});
    expect(config.gateway.port).toBe(19877);
    expect(config.policy.timezone).toBe("Europe/Berlin");
    expect(config.policy.quietHours).toEqual({ start: 22, end: 8 });
    expect(config.policy.maxDailyMessagesPerUser).toBe(3);
    expect(config.policy.antiRepetition).toEqual({
      window: 10,
      similarity: "exact",
      threshold: 0.9,
    });
    expect(config.cadence).toEqual({ minDays: 1, maxDays: 3 });
    expect(config.generation.provider).toBe("offline");
    expect(config.defaultPersona).toBe(DEFAULT_PERSONA_ID);
    expect(config.personas[DEFAULT_PERSONA_ID]?.followUps).toHaveLength(3);
    expect(config.retention.maxMessagesPerUser).toBe(0);
  });

  it("parses tagged channel accounts", () => {
    const config = parseConfig({
      channels: {
        tg: { type: "telegram", enabled: true, token: "test-token" },
        rd: {
          type: "reddit",
          clientId: "id",
          clientSecret: "test-secret",
          username: "bot",
          password: "test-password",
        },
      },
    });
    expect(config.channels["tg"]?.type).toBe("telegram");
    const reddit = config.channels["rd"];
    expect(reddit?.type === "reddit" ? reddit.pollIntervalMs : null).toBe(60_000);
    expect(reddit?.enabled).toBe(false);
  });

  it("rejects an unknown channel type", () => {
    expect(() => parseConfig({ channels: { x: { type: "fax", token: "t" } } })).toThrow();
  });

  it("accepts equal quiet-hour bounds", () => {
    const config = parseConfig({ policy: { quietHours: { start: 0, end: 0 } } });
    expect(config.policy.quietHours).toEqual({ start: 0, end: 0 });
  });

  it("rejects quiet hours outside 0-23", () => {
    expect(() => parseConfig({ policy: { quietHours: { start: 24, end: 8 } } })).toThrow();
  });

  it("enables the content filter with link and spam checks by default", () => {
    expect(parseConfig({}).policy.contentFilter).toEqual({
      enabled: true,
      forbiddenTerms: [],
      forbiddenPatterns: [],
      blockLinks: true,
      blockSpam: true,
    });
  });

  it("rejects an invalid content pattern", () => {
    expect(() =>
      parseConfig({ policy: { contentFilter: { forbiddenPatterns: ["(unclosed"] } } }),
    ).toThrow("Invalid regular expression");
  });

  it("rejects an unknown timezone", () => {
    expect(() => parseConfig({ policy: { timezone: "Mars/Olympus" } })).toThrow(
      "Unknown IANA timezone: Mars/Olympus",
    );
  });

  it("rejects cadence bounds with min above max", () => {
    expect(() => parseConfig({ cadence: { minDays: 4, maxDays: 2 } })).toThrow(
      "cadence.minDays must not exceed cadence.maxDays",
    );
  });

  it("rejects a zero-day cadence", () => {
    expect(() => parseConfig({ cadence: { minDays: 0, maxDays: 2 } })).toThrow();
  });

  it("rejects a negative daily limit", () => {
    expect(() => parseConfig({ policy: { maxDailyMessagesPerUser: -1 } })).toThrow();
  });

  it("requires an API key for the openai provider", () => {
    expect(() => parseConfig({ generation: { provider: "openai" } })).toThrow(
      "generation.apiKey is required for the openai provider",
    );
  });

  it("keeps the built-in persona next to configured ones", () => {
    const config = parseConfig({
      personas: {
        calm: {
          name: "Calm",
          systemPrompt: "Be calm.",
          intro: "Hello{name}.",
          consentRequest: "May I write now and then?",
          followUps: ["Checking in."],
        },
      },
      defaultPersona: "calm",
    });
    expect(Object.keys(config.personas).sort()).toEqual(["calm", DEFAULT_PERSONA_ID]);
  });

  it("rejects a default persona that is not configured", () => {
    expect(() => parseConfig({ defaultPersona: "ghost" })).toThrow("Unknown persona: ghost");
  });
});

describe("parseConfigText", () => {
  it("wraps schema failures in a ConfigError naming the field", () => {
    const text = JSON.stringify({ gateway: { port: "nope" } });
    try {
      parseConfigText(text, "/tmp/amicus.config.json");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError ? err.path : null).toBe("/tmp/amicus.config.json");
      expect(err instanceof Error ? err.message : "").toContain("gateway.port");
    }
  });

  it("wraps JSON syntax errors", () => {
    expect(() => parseConfigText("{ not json", "x.json")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "amicus-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env["AMICUS_TEST_TOKEN"];
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(dir, "missing.json"));
    expect(config.policy.maxDailyMessagesPerUser).toBe(3);
  });

  it("reads the file and substitutes env references", () => {
    process.env["AMICUS_TEST_TOKEN"] = "test-token";
    const path = join(dir, "amicus.config.json");
    writeFileSync(
      path,
      JSON.stringify({
        channels: { tg: { type: "telegram", token: "${env:AMICUS_TEST_TOKEN}" } },
        policy: { maxDailyMessagesPerUser: 5 },
      }),
    );
    const config = loadConfig(path);
    const tg = config.channels["tg"];
    expect(tg?.type === "telegram" ? tg.token : null).toBe("test-token");
    expect(config.policy.maxDailyMessagesPerUser).toBe(5);
  });
});
