import type { NormalizedMessage } from "../adapter.js";

/** The fields read from a Telegram `Message`; grammy's own type satisfies it. */
export interface TelegramMessageLike {
  readonly message_id: number;
  readonly date: number;
  readonly text?: string;
  readonly chat: { readonly id: number; readonly type: string };
  readonly from?: {
    readonly id: number;
    readonly is_bot: boolean;
    readonly first_name: string;
    readonly last_name?: string;
    readonly username?: string;
  };
}

/** Private text messages from people; everything else is ignored. */
export function normalizeTelegramMessage(msg: TelegramMessageLike): NormalizedMessage | null {
  const from = msg.from;
  if (!from || from.is_bot) return null;
  if (msg.chat.type !== "private") return null;
  if (msg.text === undefined || msg.text.trim() === "") return null;

  return {
    id: String(msg.message_id),
    platform: "telegram",
    platformUserId: String(from.id),
    username: from.username ?? from.first_name,
    text: msg.text,
    timestamp: msg.date * 1000,
    raw: msg,
  };
}
