import type { AdapterEvents, DeliveryResult, PlatformAdapter } from "../adapter.js";
import { fitText, toError } from "../adapter.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import type { RedditChannelConfig } from "../../config/types.js";
import { RedditClient, type FetchLike } from "./api.js";
import { normalizeRedditMessage } from "./normalize.js";
import * as send from "./send.js";

/** Private messages over Reddit's OAuth API; the inbox is polled. */
export class RedditAdapter implements PlatformAdapter {
  readonly platform = "reddit";
  readonly label = "Reddit";
  readonly maxTextLength = 10_000;
  readonly events = new TypedEventEmitter<AdapterEvents>();

  private readonly client: RedditClient;
  private timer: ReturnType<typeof setInterval> | null = null;
  private polling = false;

  constructor(
    private readonly config: RedditChannelConfig,
    fetchImpl?: FetchLike,
  ) {
    this.client = new RedditClient(config, fetchImpl);
  }

  async start(signal: AbortSignal): Promise<void> {
    await this.poll();

    this.timer = setInterval(() => {
      this.poll().catch((err: unknown) => this.events.emit("error", toError(err)));
    }, this.config.pollIntervalMs);
    this.timer.unref();

    signal.addEventListener("abort", () => {
      this.clearTimer();
    });
    this.events.emit("connected");
  }

  async stop(): Promise<void> {
    this.clearTimer();
    this.events.emit("disconnected", "stopped");
  }

  async send(platformUserId: string, text: string): Promise<DeliveryResult> {
    return send.sendText(
      this.client,
      platformUserId,
      this.config.subject,
      fitText(text, this.maxTextLength),
    );
  }

  /** Emits unread messages and marks them read. Overlapping calls are dropped. */
  async poll(): Promise<number> {
    if (this.polling) return 0;
    this.polling = true;
    try {
      const unread = await this.client.unread();
      for (const raw of unread) {
        const msg = normalizeRedditMessage(raw);
        if (msg) this.events.emit("message", msg);
      }
      await this.client.markRead(unread.map((m) => m.name));
      return unread.length;
    } finally {
      this.polling = false;
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
