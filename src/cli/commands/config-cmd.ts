import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { AmicusConfig } from "../../config/types.js";

const SECRET_KEYS = new Set(["token", "clientSecret", "password", "apiKey"]);
const REDACTED = "***REDACTED***";

/** Deep copy with every secret-looking field replaced. */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [
        key,
        SECRET_KEYS.has(key) && inner !== undefined ? REDACTED : redactSecrets(inner),
      ]),
    );
  }
  return value;
}

export function summarize(config: AmicusConfig): string {
  const { policy, cadence } = config;
  const channels = Object.entries(config.channels)
    .filter(([, channel]) => channel.enabled)
    .map(([id, channel]) => `${id} (${channel.type})`);
  return [
    `  quiet hours ${policy.quietHours.start}:00-${policy.quietHours.end}:00 ${policy.timezone}`,
    `  ${policy.maxDailyMessagesPerUser} proactive messages per day, every ${cadence.minDays}-${cadence.maxDays} days`,
    `  channels: ${channels.length > 0 ? channels.join(", ") : "none"}`,
  ].join("\n");
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (secrets redacted)",
    examples: [["Show config", "amicus config show"]],
  });

  configFile = Option.String("--config,-c", { required: false });

  async execute(): Promise<number> {
    try {
      const config = loadConfig(this.configFile);
      this.context.stdout.write(JSON.stringify(redactSecrets(config), null, 2) + "\n");
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "amicus config validate"],
      ["Validate specific file", "amicus config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const config = parseConfigText(content, configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n${summarize(config)}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
  }
}
