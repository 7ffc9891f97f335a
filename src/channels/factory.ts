import type { ChannelAccountConfig } from "../config/types.js";
import type { PlatformAdapter } from "./adapter.js";
import { DiscordAdapter } from "./discord/index.js";
import { RedditAdapter } from "./reddit/index.js";
import { TelegramAdapter } from "./telegram/index.js";

export function createAdapter(config: ChannelAccountConfig): PlatformAdapter {
  switch (config.type) {
    case "telegram":
      return new TelegramAdapter(config);
    case "discord":
      return new DiscordAdapter(config);
    case "reddit":
      return new RedditAdapter(config);
  }
}
