import { describe, it, expect } from "vitest";
import {
  normalizeTelegramMessage,
  type TelegramMessageLike,
} from "../../src/channels/telegram/normalize.js";

function makeMessage(overrides: Partial<TelegramMessageLike> = {}): TelegramMessageLike {
  return {
    message_id: 123,
    date: 1700000000,
    chat: { id: 789, type: "private" },
    from: { id: 789, is_bot: false, first_name: "Alice", username: "alice_w" },
    text: "Hello bot",
    ...overrides,
  };
}

describe("normalizeTelegramMessage", () => {
  it("normalizes a private text message", () => {
    const msg = makeMessage();
    expect(normalizeTelegramMessage(msg)).toEqual({
      id: "123",
      platform: "telegram",
      platformUserId: "789",
      username: "alice_w",
      text: "Hello bot",
      timestamp: 1700000000000,
      raw: msg,
    });
  });

  it("falls back to first name without a username", () => {
    const result = normalizeTelegramMessage(
      makeMessage({ from: { id: 789, is_bot: false, first_name: "Alice" } }),
    );
    expect(result?.username).toBe("Alice");
  });

  it("ignores group chats", () => {
    expect(
      normalizeTelegramMessage(makeMessage({ chat: { id: -100, type: "group" } })),
    ).toBeNull();
  });

  it("ignores bots", () => {
    expect(
      normalizeTelegramMessage(
        makeMessage({ from: { id: 5, is_bot: true, first_name: "Other" } }),
      ),
    ).toBeNull();
  });

  it("ignores messages without a sender", () => {
    expect(normalizeTelegramMessage(makeMessage({ from: undefined }))).toBeNull();
  });

  it("ignores empty text", () => {
    expect(normalizeTelegramMessage(makeMessage({ text: "   " }))).toBeNull();
    expect(normalizeTelegramMessage(makeMessage({ text: undefined }))).toBeNull();
  });
});
