import { describe, it, expect } from "vitest";
import { createAdapter } from "../../src/channels/factory.js";
import { fitText } from "../../src/channels/adapter.js";
import { DiscordAdapter } from "../../src/channels/discord/index.js";
import { RedditAdapter } from "../../src/channels/reddit/index.js";
import { TelegramAdapter } from "../../src/channels/telegram/index.js";
import { makeConfig } from "../helpers/fixtures.js";

describe("createAdapter", () => {
  const config = makeConfig({
    channels: {
      tg: { type: "telegram", enabled: true, token: "test-token" },
      dc: { type: "discord", enabled: true, token: "test-token" },
      rd: {
        type: "reddit",
        enabled: true,
        clientId: "test-client",
        clientSecret: "test-secret",
        username: "amicus_bot",
        password: "test-password",
      },
    },
  });

  it("builds the adapter for each platform", () => {
    const adapters = Object.values(config.channels).map(createAdapter);
    expect(adapters[0]).toBeInstanceOf(TelegramAdapter);
    expect(adapters[1]).toBeInstanceOf(DiscordAdapter);
    expect(adapters[2]).toBeInstanceOf(RedditAdapter);
    expect(adapters.map((a) => [a.platform, a.maxTextLength])).toEqual([
      ["telegram", 4096],
      ["discord", 2000],
      ["reddit", 10_000],
    ]);
  });

  it("refuses to send before the bot is started", async () => {
    const [telegram] = Object.values(config.channels).map(createAdapter);
    expect(await telegram?.send("1", "hi")).toEqual({
      ok: false,
      reason: "error",
      error: "Telegram bot not started",
    });
  });
});

describe("fitText", () => {
  it("leaves short text alone", () => {
    expect(fitText("hello", 10)).toBe("hello");
  });

  it("cuts long text to the limit with an ellipsis", () => {
    expect(fitText("hello world", 6)).toBe("hello…");
  });
});
