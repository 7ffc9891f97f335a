import { GrammyError } from "grammy";
import {
  delivered,
  deliveryFailed,
  type DeliveryFailureReason,
  type DeliveryResult,
} from "../adapter.js";

export function classifyTelegramError(err: unknown): DeliveryFailureReason {
  if (err instanceof GrammyError) {
    // 403: blocked, deactivated, or the user never started the bot
    if (err.error_code === 403) return "unreachable";
    if (err.error_code === 400 && /chat not found|user not found/i.test(err.description)) {
      return "unreachable";
    }
    if (err.error_code === 400) return "rejected";
    return "error";
  }
  // HttpError and anything else: network trouble
  return "error";
}

/** The slice of grammy's `Api` used for sending; `bot.api` satisfies it. */
export interface TelegramApi {
  sendMessage(chatId: string, text: string): Promise<{ message_id: number }>;
}

export async function sendText(api: TelegramApi, to: string, text: string): Promise<DeliveryResult> {
  try {
    const msg = await api.sendMessage(to, text);
    return delivered(String(msg.message_id));
  } catch (err) {
    return deliveryFailed(classifyTelegramError(err), err);
  }
}
