import { Bot } from "grammy";
import type { AdapterEvents, DeliveryResult, PlatformAdapter } from "../adapter.js";
import { fitText, toError } from "../adapter.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import type { TelegramChannelConfig } from "../../config/types.js";
import { normalizeTelegramMessage } from "./normalize.js";
import * as send from "./send.js";

export class TelegramAdapter implements PlatformAdapter {
  readonly platform = "telegram";
  readonly label = "Telegram";
  readonly maxTextLength = 4096;
  readonly events = new TypedEventEmitter<AdapterEvents>();

  private bot: Bot | null = null;

  constructor(private readonly config: TelegramChannelConfig) {}

  async start(signal: AbortSignal): Promise<void> {
    const bot = new Bot(this.config.token);
    this.bot = bot;

    bot.on("message:text", (ctx) => {
      const msg = normalizeTelegramMessage(ctx.message);
      if (msg) this.events.emit("message", msg);
    });

    bot.catch((err) => {
      this.events.emit("error", toError(err.error));
    });

    signal.addEventListener("abort", () => {
      bot.stop().catch((err: unknown) => this.events.emit("error", toError(err)));
    });

    await bot.init();

    // bot.start() resolves only when polling stops
    bot.start({ drop_pending_updates: true }).catch((err: unknown) => {
      this.events.emit("error", toError(err));
    });
    this.events.emit("connected");
  }

  async stop(): Promise<void> {
    await this.bot?.stop();
    this.bot = null;
    this.events.emit("disconnected", "stopped");
  }

  async send(platformUserId: string, text: string): Promise<DeliveryResult> {
    if (!this.bot) {
      return { ok: false, reason: "error", error: "Telegram bot not started" };
    }
    return send.sendText(this.bot.api, platformUserId, fitText(text, this.maxTextLength));
  }
}
