import { Command, Option } from "clipanion";
import { PLATFORMS } from "../../conversation/types.js";
import { formatInstant, openStore, parseUserKey } from "../store.js";

export class UserShowCommand extends Command {
  static override paths = [["user", "show"]];

  static override usage = Command.Usage({
    description: "Show a user's conversation state, counters and recent history",
    examples: [["Show a Telegram user", "amicus user show telegram 123456"]],
  });

  platform = Option.String({ name: "platform", required: true });
  userId = Option.String({ name: "id", required: true });
  limit = Option.String("--limit,-n", "10", { description: "Messages to show" });

  async execute(): Promise<number> {
    const key = parseUserKey(this.platform, this.userId);
    if (!key) {
      this.context.stdout.write(
        `Unknown platform: ${this.platform} (expected ${PLATFORMS.join(", ")})\n`,
      );
      return 1;
    }

    const store = openStore();
    try {
      const user = await store.getUser(key);
      if (!user) {
        this.context.stdout.write(`No conversation for ${key.platform}:${key.platformUserId}\n`);
        return 1;
      }

      const messages = await store.recentMessages(user.id, Number(this.limit) || 10);
      this.context.stdout.write(
        `${user.platform}:${user.platformUserId}${user.username ? ` (${user.username})` : ""}\n` +
          `  state: ${user.state}${user.unreachable ? " (unreachable)" : ""}\n` +
          `  timezone: ${user.timezone}\n` +
          `  sent today: ${user.dailyMessageCount} (window ${user.countWindowStart ?? "-"})\n` +
          `  last inbound: ${formatInstant(user.lastInboundAt)}\n` +
          `  last outbound: ${formatInstant(user.lastOutboundAt)}\n` +
          `  next contact: ${formatInstant(user.nextScheduledContact)}\n` +
          `  messages (${messages.length}):\n`,
      );
      for (const msg of messages) {
        this.context.stdout.write(
          `    [${formatInstant(msg.timestamp)}] ${msg.sender}: ${msg.text}\n`,
        );
      }
      return 0;
    } finally {
      store.close();
    }
  }
}

export class UserForgetCommand extends Command {
  static override paths = [["user", "forget"]];

  static override usage = Command.Usage({
    description: "Delete a user's conversation and history, as /forget does",
    examples: [["Forget a Discord user", "amicus user forget discord 9876543210"]],
  });

  platform = Option.String({ name: "platform", required: true });
  userId = Option.String({ name: "id", required: true });

  async execute(): Promise<number> {
    const key = parseUserKey(this.platform, this.userId);
    if (!key) {
      this.context.stdout.write(`Unknown platform: ${this.platform}\n`);
      return 1;
    }

    const store = openStore();
    try {
      const user = await store.getUser(key);
      if (!user || !(await store.deleteConversation(user.id))) {
        this.context.stdout.write(`No conversation for ${key.platform}:${key.platformUserId}\n`);
        return 1;
      }
      this.context.stdout.write(`Forgotten: ${key.platform}:${key.platformUserId}\n`);
      return 0;
    } finally {
      store.close();
    }
  }
}
