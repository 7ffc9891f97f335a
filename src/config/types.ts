import type { z } from "zod";
import type { amicusConfigSchema } from "./schema.js";

export type AmicusConfig = z.output<typeof amicusConfigSchema>;

export type GatewayConfig = AmicusConfig["gateway"];
export type ChannelAccountConfig = AmicusConfig["channels"][string];
export type TelegramChannelConfig = Extract<ChannelAccountConfig, { type: "telegram" }>;
export type DiscordChannelConfig = Extract<ChannelAccountConfig, { type: "discord" }>;
export type RedditChannelConfig = Extract<ChannelAccountConfig, { type: "reddit" }>;
export type LoggingConfig = AmicusConfig["logging"];
export type PolicyConfig = AmicusConfig["policy"];
export type QuietHoursConfig = PolicyConfig["quietHours"];
export type AntiRepetitionConfig = PolicyConfig["antiRepetition"];
export type ContentFilterConfig = PolicyConfig["contentFilter"];
export type CadenceConfig = AmicusConfig["cadence"];
export type DispatchConfig = AmicusConfig["dispatch"];
export type GenerationConfig = AmicusConfig["generation"];
export type PersonaConfig = AmicusConfig["personas"][string];
export type RetentionConfig = AmicusConfig["retention"];
