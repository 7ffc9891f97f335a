import type { NormalizedMessage } from "../adapter.js";
import type { RedditMessage } from "./api.js";

export function normalizeRedditMessage(msg: RedditMessage): NormalizedMessage | null {
  if (!msg.author || msg.author === "[deleted]") return null;
  if (msg.body.trim() === "") return null;

  return {
    id: msg.name,
    platform: "reddit",
    platformUserId: msg.author,
    username: msg.author,
    text: msg.body,
    timestamp: Math.round(msg.created_utc * 1000),
    raw: msg,
  };
}
