import { DiscordAPIError, RESTJSONErrorCodes } from "discord.js";
import {
  delivered,
  deliveryFailed,
  type DeliveryFailureReason,
  type DeliveryResult,
} from "../adapter.js";

const UNREACHABLE_CODES = new Set<number | string>([
  RESTJSONErrorCodes.CannotSendMessagesToThisUser,
  RESTJSONErrorCodes.UnknownUser,
]);

export function classifyDiscordError(err: unknown): DeliveryFailureReason {
  if (err instanceof DiscordAPIError) {
    if (UNREACHABLE_CODES.has(err.code)) return "unreachable";
    if (err.status === 400) return "rejected";
  }
  return "error";
}

/** `client.users` satisfies this. */
export interface DiscordUsers {
  send(userId: string, options: { content: string }): Promise<{ id: string }>;
}

export async function sendText(
  users: DiscordUsers,
  userId: string,
  text: string,
): Promise<DeliveryResult> {
  try {
    const msg = await users.send(userId, { content: text });
    return delivered(msg.id);
  } catch (err) {
    return deliveryFailed(classifyDiscordError(err), err);
  }
}
