import { z } from "zod";
import type { RedditChannelConfig } from "../../config/types.js";

const AUTH_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE = "https://oauth.reddit.com";
// Refresh a minute before Reddit expires the token
const TOKEN_SKEW_MS = 60_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class RedditApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly codes: readonly string[] = [],
  ) {
    super(message);
    this.name = "RedditApiError";
  }
}

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

export const redditMessageSchema = z.object({
  id: z.string(),
  name: z.string(),
  author: z.string().nullable(),
  body: z.string(),
  subject: z.string(),
  created_utc: z.number(),
  was_comment: z.boolean(),
});

export type RedditMessage = z.infer<typeof redditMessageSchema>;

const listingSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        kind: z.string(),
        data: z.unknown(),
      }),
    ),
  }),
});

const composeSchema = z.object({
  json: z.object({
    // [code, message, field]
    errors: z.array(z.array(z.string().nullable())),
  }),
});

/** Minimal OAuth client for a Reddit "script" application. */
export class RedditClient {
  private token: { value: string; expiresAt: number } | null = null;

  constructor(
    private readonly config: Pick<
      RedditChannelConfig,
      "clientId" | "clientSecret" | "username" | "password" | "userAgent"
    >,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly now: () => number = Date.now,
  ) {}

  /** Unread private messages, oldest first. Comment replies are skipped. */
  async unread(): Promise<RedditMessage[]> {
    const body = await this.request("GET", "/message/unread?limit=100");
    const listing = listingSchema.parse(body);
    const messages: RedditMessage[] = [];
    for (const child of listing.data.children) {
      if (child.kind !== "t4") continue;
      const parsed = redditMessageSchema.safeParse(child.data);
      if (parsed.success && !parsed.data.was_comment) messages.push(parsed.data);
    }
    return messages.sort((a, b) => a.created_utc - b.created_utc);
  }

  async markRead(fullnames: readonly string[]): Promise<void> {
    if (fullnames.length === 0) return;
    await this.request("POST", "/api/read_message", { id: fullnames.join(",") });
  }

  async compose(to: string, subject: string, text: string): Promise<void> {
    const body = await this.request("POST", "/api/compose", {
      api_type: "json",
      to,
      subject,
      text,
    });
    const errors = composeSchema.parse(body).json.errors;
    if (errors.length > 0) {
      const codes = errors.map((e) => e[0] ?? "UNKNOWN");
      throw new RedditApiError(`compose failed: ${codes.join(", ")}`, 200, codes);
    }
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) return this.token.value;

    const basic = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString(
      "base64",
    );
    const response = await this.fetchImpl(AUTH_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${basic}`,
        "User-Agent": this.config.userAgent,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({
        grant_type: "password",
        username: this.config.username,
        password: this.config.password,
      }).toString(),
    });
    if (!response.ok) {
      throw new RedditApiError(`token request failed: ${response.status}`, response.status);
    }

    const token = tokenSchema.parse(await response.json());
    this.token = {
      value: token.access_token,
      expiresAt: this.now() + token.expires_in * 1000 - TOKEN_SKEW_MS,
    };
    return token.access_token;
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    form?: Record<string, string>,
  ): Promise<unknown> {
    const token = await this.accessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      "User-Agent": this.config.userAgent,
    };
    if (form) headers["Content-Type"] = "application/x-www-form-urlencoded";

    const response = await this.fetchImpl(`${API_BASE}${path}`, {
      method,
      headers,
      body: form ? new URLSearchParams(form).toString() : undefined,
    });
    if (response.status === 401) this.token = null;
    if (!response.ok) {
      throw new RedditApiError(`${method} ${path} failed: ${response.status}`, response.status);
    }
    return response.json();
  }
}
