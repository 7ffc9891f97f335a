import type { Platform } from "../conversation/types.js";
import type { TypedEventEmitter } from "../utils/typed-emitter.js";

/** Direct message from a user, reduced to what the dispatch loop needs. */
export interface NormalizedMessage {
  readonly id: string;
  readonly platform: Platform;
  readonly platformUserId: string;
  readonly username: string | null;
  readonly text: string;
  readonly timestamp: number;
  readonly raw: unknown;
}

/**
 * unreachable: the platform will not deliver to this user until they write
 * first (never opened a DM, blocked the bot, account gone).
 * rejected: the message itself was refused.
 * error: transport failure; worth retrying later.
 */
export type DeliveryFailureReason = "unreachable" | "rejected" | "error";

export type DeliveryResult =
  | { readonly ok: true; readonly messageId: string }
  | { readonly ok: false; readonly reason: DeliveryFailureReason; readonly error: string };

export interface AdapterEvents {
  message: [msg: NormalizedMessage];
  error: [err: Error];
  connected: [];
  disconnected: [reason?: string];
}

export interface PlatformAdapter {
  readonly platform: Platform;
  readonly label: string;
  readonly maxTextLength: number;
  readonly events: TypedEventEmitter<AdapterEvents>;

  start(signal: AbortSignal): Promise<void>;
  stop(): Promise<void>;
  /** Never throws for delivery problems; they come back as a failed result. */
  send(platformUserId: string, text: string): Promise<DeliveryResult>;
}

export function delivered(messageId: string): DeliveryResult {
  return { ok: true, messageId };
}

export function deliveryFailed(reason: DeliveryFailureReason, err: unknown): DeliveryResult {
  return { ok: false, reason, error: err instanceof Error ? err.message : String(err) };
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Cuts text to the platform limit, marking the cut with an ellipsis. */
export function fitText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}
