import { describe, it, expect } from "vitest";
import type { FetchLike } from "../../src/channels/reddit/api.js";
import { RedditAdapter } from "../../src/channels/reddit/index.js";
import type { NormalizedMessage } from "../../src/channels/adapter.js";
import type { RedditChannelConfig } from "../../src/config/types.js";

const config: RedditChannelConfig = {
  type: "reddit",
  enabled: true,
  clientId: "test-client",
  clientSecret: "test-secret",
  username: "amicus_bot",
  password: "test-password",
  userAgent: "amicus-test/0.1",
  pollIntervalMs: 60_000,
  subject: "Hello from Amicus",
};

function inbox(children: unknown[]): { fetch: FetchLike; marked: string[] } {
  const marked: string[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    if (url.endsWith("access_token")) {
      return Response.json({ access_token: "test-token", expires_in: 3600 });
    }
    if (url.endsWith("/api/read_message")) {
      marked.push(new URLSearchParams(String(init?.body)).get("id") ?? "");
      return Response.json({});
    }
    if (url.endsWith("/api/compose")) {
      return Response.json({ json: { errors: [] } });
    }
    return Response.json({ data: { children } });
  };
  return { fetch: fetchImpl, marked };
}

const message = {
  kind: "t4",
  data: {
    id: "a1",
    name: "t4_a1",
    author: "alice",
    body: "hi bot",
    subject: "re: Hello",
    created_utc: 1700000000,
    was_comment: false,
  },
};

describe("RedditAdapter", () => {
  it("emits unread messages and marks them read", async () => {
    const { fetch, marked } = inbox([message]);
    const adapter = new RedditAdapter(config, fetch);
    const received: NormalizedMessage[] = [];
    adapter.events.on("message", (msg) => received.push(msg));

    expect(await adapter.poll()).toBe(1);
    expect(received.map((m) => [m.platformUserId, m.text])).toEqual([["alice", "hi bot"]]);
    expect(marked).toEqual(["t4_a1"]);
  });

  it("drops a poll that overlaps a running one", async () => {
    const { fetch } = inbox([message]);
    const adapter = new RedditAdapter(config, fetch);
    const [first, second] = await Promise.all([adapter.poll(), adapter.poll()]);
    expect(first).toBe(1);
    expect(second).toBe(0);
  });

  it("sends through compose", async () => {
    const { fetch } = inbox([]);
    const adapter = new RedditAdapter(config, fetch);
    const result = await adapter.send("alice", "How was your week?");
    expect(result.ok).toBe(true);
  });
});
