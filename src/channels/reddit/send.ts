import {
  delivered,
  deliveryFailed,
  type DeliveryFailureReason,
  type DeliveryResult,
} from "../adapter.js";
import { RedditApiError, type RedditClient } from "./api.js";

const UNREACHABLE_CODES = new Set([
  "USER_DOESNT_EXIST",
  "NOT_WHITELISTED_BY_USER_MESSAGE",
  "USER_BLOCKED",
  "USER_BLOCKED_MESSAGE",
]);

export function classifyRedditError(err: unknown): DeliveryFailureReason {
  if (err instanceof RedditApiError) {
    if (err.codes.some((code) => UNREACHABLE_CODES.has(code))) return "unreachable";
    if (err.codes.length > 0) return "rejected";
    if (err.status === 403) return "unreachable";
  }
  return "error";
}

export async function sendText(
  client: RedditClient,
  to: string,
  subject: string,
  text: string,
): Promise<DeliveryResult> {
  try {
    await client.compose(to, subject, text);
    // compose returns no id for the new message
    return delivered(`${to}:${Date.now()}`);
  } catch (err) {
    return deliveryFailed(classifyRedditError(err), err);
  }
}
