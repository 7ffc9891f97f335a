export const COMMANDS = ["pause", "resume", "forget", "start", "status", "help"] as const;

export type Command = (typeof COMMANDS)[number];

// Telegram appends "@botname" to commands issued in a menu
const COMMAND_PATTERN = /^\/([a-z]+)(?:@[\w.]+)?$/i;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/** Recognizes an in-band command in the first token of the text, case-insensitively. */
export function parseCommand(text: string): Command | null {
  const first = text.trim().split(/\s+/, 1)[0] ?? "";
  const match = COMMAND_PATTERN.exec(first);
  const name = match?.[1]?.toLowerCase();
  return name !== undefined && isCommand(name) ? name : null;
}
