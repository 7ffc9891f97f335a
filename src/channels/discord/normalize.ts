import type { NormalizedMessage } from "../adapter.js";

/** The fields read from a discord.js `Message`. */
export interface DiscordMessageLike {
  readonly id: string;
  readonly content: string;
  readonly createdTimestamp: number;
  readonly author: {
    readonly id: string;
    readonly bot: boolean;
    readonly username: string;
    readonly globalName: string | null;
  };
  readonly channel: { isDMBased(): boolean };
}

export function normalizeDiscordMessage(msg: DiscordMessageLike): NormalizedMessage | null {
  if (msg.author.bot) return null;
  if (!msg.channel.isDMBased()) return null;
  if (msg.content.trim() === "") return null;

  return {
    id: msg.id,
    platform: "discord",
    platformUserId: msg.author.id,
    username: msg.author.globalName ?? msg.author.username,
    text: msg.content,
    timestamp: msg.createdTimestamp,
    raw: msg,
  };
}
