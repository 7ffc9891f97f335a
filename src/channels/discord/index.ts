import { Client, GatewayIntentBits, Partials } from "discord.js";
import type { AdapterEvents, DeliveryResult, PlatformAdapter } from "../adapter.js";
import { fitText, toError } from "../adapter.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import type { DiscordChannelConfig } from "../../config/types.js";
import { normalizeDiscordMessage } from "./normalize.js";
import * as send from "./send.js";

export class DiscordAdapter implements PlatformAdapter {
  readonly platform = "discord";
  readonly label = "Discord";
  readonly maxTextLength = 2000;
  readonly events = new TypedEventEmitter<AdapterEvents>();

  private client: Client | null = null;

  constructor(private readonly config: DiscordChannelConfig) {}

  async start(signal: AbortSignal): Promise<void> {
    const client = new Client({
      intents: [GatewayIntentBits.DirectMessages, GatewayIntentBits.MessageContent],
      // DM channels arrive uncached
      partials: [Partials.Channel, Partials.Message],
    });
    this.client = client;

    client.on("ready", () => {
      this.events.emit("connected");
    });

    client.on("messageCreate", (discordMsg) => {
      const msg = normalizeDiscordMessage(discordMsg);
      if (msg) this.events.emit("message", msg);
    });

    client.on("error", (err) => {
      this.events.emit("error", err);
    });

    signal.addEventListener("abort", () => {
      client.destroy().catch((err: unknown) => this.events.emit("error", toError(err)));
    });

    await client.login(this.config.token);
  }

  async stop(): Promise<void> {
    await this.client?.destroy();
    this.client = null;
    this.events.emit("disconnected", "stopped");
  }

  async send(platformUserId: string, text: string): Promise<DeliveryResult> {
    if (!this.client) {
      return { ok: false, reason: "error", error: "Discord client not started" };
    }
    return send.sendText(this.client.users, platformUserId, fitText(text, this.maxTextLength));
  }
}
