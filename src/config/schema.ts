import { z } from "zod";
import { isValidTimezone } from "../clock/timezone.js";
import type { AmicusConfig } from "./types.js";

export const DEFAULT_PERSONA_ID = "companion";

const hourSchema = z.number().int().min(0).max(23);

const timezoneSchema = z
  .string()
  .refine(isValidTimezone, (tz) => ({ message: `Unknown IANA timezone: ${tz}` }));

const telegramChannelSchema = z.object({
  type: z.literal("telegram"),
  enabled: z.boolean().default(false),
  token: z.string().min(1),
});

const discordChannelSchema = z.object({
  type: z.literal("discord"),
  enabled: z.boolean().default(false),
  token: z.string().min(1),
});

const redditChannelSchema = z.object({
  type: z.literal("reddit"),
  enabled: z.boolean().default(false),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  username: z.string().min(1),
  password: z.string().min(1),
  userAgent: z.string().default("amicus/0.1"),
  pollIntervalMs: z.number().int().positive().default(60_000),
  subject: z.string().min(1).default("Hello"),
});

const channelAccountSchema = z.discriminatedUnion("type", [
  telegramChannelSchema,
  discordChannelSchema,
  redditChannelSchema,
]);

const gatewaySchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().positive().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const regexSchema = z.string().min(1).refine(
  (source) => {
    try {
      new RegExp(source, "iu");
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" },
);

const policySchema = z.object({
  timezone: timezoneSchema.default("Europe/Berlin"),
  quietHours: z.object({
    // start == end is accepted and blocks the whole day
    start: hourSchema.default(22),
    end: hourSchema.default(8),
  }).default({}),
  maxDailyMessagesPerUser: z.number().int().min(0).default(3),
  antiRepetition: z.object({
    window: z.number().int().positive().default(10),
    similarity: z.enum(["exact", "normalized", "jaccard"]).default("exact"),
    threshold: z.number().min(0).max(1).default(0.9),
  }).default({}),
  contentFilter: z.object({
    enabled: z.boolean().default(true),
    // Whole words or phrases, case-insensitive
    forbiddenTerms: z.array(z.string().trim().min(1)).default([]),
    forbiddenPatterns: z.array(regexSchema).default([]),
    blockLinks: z.boolean().default(true),
    blockSpam: z.boolean().default(true),
  }).default({}),
});

const cadenceSchema = z
  .object({
    minDays: z.number().int().min(1).default(1),
    maxDays: z.number().int().min(1).default(3),
  })
  .refine((c) => c.minDays <= c.maxDays, {
    message: "cadence.minDays must not exceed cadence.maxDays",
  });

const dispatchSchema = z.object({
  scanIntervalMs: z.number().int().positive().default(300_000),
  scanBatchSize: z.number().int().positive().default(50),
  storeRetryDelayMs: z.number().int().min(0).default(250),
  historyLimit: z.number().int().positive().default(20),
});

const generationSchema = z.object({
  provider: z.enum(["openai", "offline"]).default("offline"),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0.6),
  maxTokens: z.number().int().positive().default(300),
  timeoutMs: z.number().int().positive().default(20_000),
});

const personaSchema = z.object({
  name: z.string().min(1),
  systemPrompt: z.string().min(1),
  intro: z.string().min(1),
  consentRequest: z.string().min(1),
  followUps: z.array(z.string().min(1)).min(1),
});

export const DEFAULT_PERSONA: z.input<typeof personaSchema> = {
  name: "Amicus",
  systemPrompt:
    "You are a friendly, respectful AI companion for casual conversation. " +
    "Keep the dialogue light, show empathy, never push, never sell, never ask for personal data. " +
    "Answer briefly and naturally, like a person would. Do not repeat the user's words back verbatim. " +
    "When asked something general like 'how are you', give a natural answer and a gentle question in return.",
  intro:
    "Hi{name}! I'm a small AI bot for friendly conversation. Commands: /pause, /resume, /forget",
  consentRequest:
    "I want to make sure you're comfortable with this. I may occasionally write first to keep the conversation going. " +
    "If that's fine, just reply and we'll continue. If not, send /pause.",
  followUps: [
    "Just a small ping. How is your day going?",
    "Hi! Hope all is well. Happy to pick up our chat whenever you feel like it.",
    "Hey, just wanted to check in. What have you been up to lately?",
  ],
};

const retentionSchema = z.object({
  // 0 keeps the full history
  maxMessagesPerUser: z.number().int().min(0).default(0),
});

export const amicusConfigSchema = z
  .object({
    gateway: gatewaySchema.default({}),
    channels: z.record(z.string(), channelAccountSchema).default({}),
    logging: loggingSchema.default({}),
    policy: policySchema.default({}),
    cadence: cadenceSchema.default({}),
    dispatch: dispatchSchema.default({}),
    generation: generationSchema.default({}),
    personas: z
      .record(z.string(), personaSchema)
      .default({})
      .transform((personas): Record<string, z.output<typeof personaSchema>> => ({ [DEFAULT_PERSONA_ID]: DEFAULT_PERSONA, ...personas })),
    defaultPersona: z.string().default(DEFAULT_PERSONA_ID),
    retention: retentionSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (!(config.defaultPersona in config.personas)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultPersona"],
        message: `Unknown persona: ${config.defaultPersona}`,
      });
    }
    if (config.generation.provider === "openai" && !config.generation.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["generation", "apiKey"],
        message: "generation.apiKey is required for the openai provider",
      });
    }
  });

export function parseConfig(raw: unknown): AmicusConfig {
  return amicusConfigSchema.parse(raw);
}
