import { Command, Option } from "clipanion";
import { formatInstant, openStore } from "../store.js";

export class DueListCommand extends Command {
  static override paths = [["due", "list"]];

  static override usage = Command.Usage({
    description: "List users whose next proactive contact is due",
    examples: [
      ["Due now", "amicus due list"],
      ["Due within the next day", "amicus due list --within 24h"],
    ],
  });

  within = Option.String("--within", {
    required: false,
    description: "Look ahead, e.g. 30m, 12h, 2d",
  });

  async execute(): Promise<number> {
    let ahead = 0;
    if (this.within !== undefined) {
      const parsed = parseDuration(this.within);
      if (parsed === null) {
        this.context.stdout.write(`Invalid duration: ${this.within}\n`);
        return 1;
      }
      ahead = parsed;
    }

    const store = openStore();
    try {
      const due = await store.listDueUsers(Date.now() + ahead, 1000);
      if (due.length === 0) {
        this.context.stdout.write("No contacts due.\n");
        return 0;
      }
      this.context.stdout.write(`Due contacts (${due.length}):\n`);
      for (const user of due) {
        this.context.stdout.write(
          `  ${user.platform}:${user.platformUserId}  ${formatInstant(user.nextScheduledContact)}  ` +
            `sent today: ${user.dailyMessageCount}\n`,
        );
      }
      return 0;
    } finally {
      store.close();
    }
  }
}

const UNIT_MS: Record<string, number> = { m: 60_000, h: 3_600_000, d: 86_400_000 };

export function parseDuration(text: string): number | null {
  const match = /^(\d+)([mhd])$/.exec(text.trim());
  if (!match) return null;
  const unit = UNIT_MS[match[2] ?? ""];
  return unit === undefined ? null : Number(match[1]) * unit;
}
