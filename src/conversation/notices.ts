import { formatLocalDateTime } from "../clock/timezone.js";
import type { PersistedState } from "./types.js";

export type NoticeKind =
  | "paused"
  | "resumed"
  | "forgotten"
  | "declined"
  | "already_chatting"
  | "help";

/** System notices answer commands; they are sent but not kept in the history. */
export const NOTICES: Readonly<Record<NoticeKind, string>> = {
  paused: "Okay, I've paused. I won't write first until you send /resume.",
  resumed: "We're back on. Glad to continue our chat :)",
  forgotten: "Done. I've forgotten our history. We can start over whenever you like.",
  declined: "No problem, I won't write first. If you change your mind, send /resume.",
  already_chatting: "We're already chatting. Commands: /pause, /resume, /forget, /status, /help",
  help: [
    "Commands:",
    "/pause - stop me from writing first",
    "/resume - let me write first again",
    "/forget - erase our history",
    "/status - what I have planned",
    "/help - this message",
  ].join("\n"),
};

const STATE_LABELS: Readonly<Record<PersistedState, string>> = {
  new: "not started",
  awaiting_consent: "waiting for your okay",
  active: "active",
  paused: "paused",
};

export interface StatusView {
  readonly state: PersistedState;
  readonly timezone: string;
  readonly nextContact: number | null;
  readonly sentToday: number;
  readonly dailyLimit: number;
}

/** Answer to /status. Like the notices, it is not kept in the history. */
export function renderStatus(view: StatusView): string {
  const next =
    view.nextContact === null
      ? "nothing planned"
      : `${formatLocalDateTime(view.nextContact, view.timezone)} (${view.timezone})`;
  return [
    `Conversation: ${STATE_LABELS[view.state]}`,
    `Next message from me: ${next}`,
    `Sent today: ${view.sentToday} of ${view.dailyLimit}`,
  ].join("\n");
}
