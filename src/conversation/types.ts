export const PLATFORMS = ["telegram", "discord", "reddit"] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

export type ConversationState =
  | "new"
  | "awaiting_consent"
  | "active"
  | "paused"
  | "forgotten";

/** Forgotten conversations are deleted, so they never reach the store. */
export type PersistedState = Exclude<ConversationState, "forgotten">;

export interface UserKey {
  readonly platform: Platform;
  readonly platformUserId: string;
}

export function identityKey(key: UserKey): string {
  return `${key.platform}:${key.platformUserId}`;
}

export interface UserRecord extends UserKey {
  readonly id: number;
  readonly username: string | null;
  readonly state: PersistedState;
  /** Persona id, fixed when the conversation is created. */
  readonly persona: string;
  readonly timezone: string;
  readonly dailyMessageCount: number;
  /** Local date (YYYY-MM-DD) the daily count belongs to. */
  readonly countWindowStart: string | null;
  readonly lastInboundAt: number | null;
  readonly lastOutboundAt: number | null;
  readonly nextScheduledContact: number | null;
  /** Set when the platform refused delivery; cleared by the next inbound message. */
  readonly unreachable: boolean;
  readonly createdAt: number;
}

export type MessageSender = "user" | "agent";

export interface StoredMessage {
  readonly id: number;
  readonly userId: number;
  readonly sender: MessageSender;
  readonly text: string;
  readonly timestamp: number;
}

export interface Persona {
  readonly id: string;
  readonly name: string;
  readonly systemPrompt: string;
  /** Greeting; `{name}` becomes ", <username>" or nothing. */
  readonly intro: string;
  readonly consentRequest: string;
  readonly followUps: readonly string[];
}
