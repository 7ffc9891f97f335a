import { describe, it, expect } from "vitest";
import {
  normalizeDiscordMessage,
  type DiscordMessageLike,
} from "../../src/channels/discord/normalize.js";

function mockMessage(
  overrides: Partial<DiscordMessageLike> = {},
  dm = true,
): DiscordMessageLike {
  return {
    id: "msg-1",
    content: "Hello world",
    createdTimestamp: 1700000000000,
    author: { id: "user-1", bot: false, username: "testuser", globalName: "Test User" },
    channel: { isDMBased: () => dm },
    ...overrides,
  };
}

describe("normalizeDiscordMessage", () => {
  it("normalizes a direct message", () => {
    const msg = mockMessage();
    expect(normalizeDiscordMessage(msg)).toEqual({
      id: "msg-1",
      platform: "discord",
      platformUserId: "user-1",
      username: "Test User",
      text: "Hello world",
      timestamp: 1700000000000,
      raw: msg,
    });
  });

  it("uses the account name when no display name is set", () => {
    const msg = mockMessage({
      author: { id: "user-1", bot: false, username: "testuser", globalName: null },
    });
    expect(normalizeDiscordMessage(msg)?.username).toBe("testuser");
  });

  it("ignores guild channels", () => {
    expect(normalizeDiscordMessage(mockMessage({}, false))).toBeNull();
  });

  it("ignores bots", () => {
    const msg = mockMessage({
      author: { id: "bot-1", bot: true, username: "helper", globalName: null },
    });
    expect(normalizeDiscordMessage(msg)).toBeNull();
  });

  it("ignores empty content", () => {
    expect(normalizeDiscordMessage(mockMessage({ content: "" }))).toBeNull();
  });
});
