import type { GenerationRequest, TextGenerator } from "./types.js";

export const OFFLINE_PING = "Just a small ping :) How are you?";
const MAX_ECHO_LENGTH = 300;

/** Deterministic answer to the latest inbound text. */
export function offlineReply(latestInbound: string): string {
  const base = latestInbound.trim();
  if (base === "") return OFFLINE_PING;
  const clipped = base.length > MAX_ECHO_LENGTH ? `${base.slice(0, MAX_ECHO_LENGTH)}...` : base;
  return `I'm listening. ${clipped}`;
}

export class OfflineResponder implements TextGenerator {
  readonly name = "offline";

  async generate(request: GenerationRequest): Promise<string> {
    if (request.mode === "follow_up") {
      return request.hint ?? OFFLINE_PING;
    }
    const latest = [...request.history].reverse().find((m) => m.sender === "user");
    return offlineReply(latest?.text ?? "");
  }
}
