import type { Command } from "./commands.js";
import type { ConsentSignal } from "./consent.js";
import type { NoticeKind } from "./notices.js";
import type { ConversationState } from "./types.js";

export type ConversationEvent =
  | { readonly type: "message"; readonly consent: ConsentSignal }
  | { readonly type: "command"; readonly command: Command };

export type ConversationEffect =
  | { readonly type: "send_intro" }
  | { readonly type: "reply" }
  | { readonly type: "schedule_cadence" }
  | { readonly type: "cancel_schedule" }
  | { readonly type: "erase_conversation" }
  | { readonly type: "report_status" }
  | { readonly type: "notify"; readonly notice: NoticeKind };

export interface Transition {
  readonly from: ConversationState;
  readonly next: ConversationState;
  readonly effects: readonly ConversationEffect[];
}

const SEND_INTRO: ConversationEffect = { type: "send_intro" };
const REPLY: ConversationEffect = { type: "reply" };
const SCHEDULE: ConversationEffect = { type: "schedule_cadence" };
const CANCEL: ConversationEffect = { type: "cancel_schedule" };
const ERASE: ConversationEffect = { type: "erase_conversation" };
const REPORT_STATUS: ConversationEffect = { type: "report_status" };

function notify(notice: NoticeKind): ConversationEffect {
  return { type: "notify", notice };
}

function to(
  from: ConversationState,
  next: ConversationState,
  ...effects: ConversationEffect[]
): Transition {
  return { from, next, effects };
}

function onMessage(state: ConversationState, consent: ConsentSignal): Transition {
  switch (state) {
    case "new":
    case "forgotten":
      return to(state, "awaiting_consent", SEND_INTRO);
    case "awaiting_consent":
      return consent === "negative"
        ? to(state, "paused", CANCEL, notify("declined"))
        : to(state, "active", REPLY, SCHEDULE);
    case "active":
      return to(state, "active", REPLY, SCHEDULE);
    case "paused":
      // Recorded, not answered, until /resume
      return to(state, "paused");
  }
}

function onCommand(state: ConversationState, command: Command): Transition {
  switch (command) {
    case "pause":
      if (state === "new" || state === "forgotten") {
        return to(state, "paused", notify("paused"));
      }
      return to(state, "paused", CANCEL, notify("paused"));
    case "resume":
      if (state === "new" || state === "forgotten") {
        return to(state, "awaiting_consent", SEND_INTRO);
      }
      return to(state, "active", notify("resumed"), SCHEDULE);
    case "forget":
      return to(state, "forgotten", ERASE, notify("forgotten"));
    case "start":
      if (state === "new" || state === "forgotten") {
        return to(state, "awaiting_consent", SEND_INTRO);
      }
      return to(state, state, notify("already_chatting"));
    case "status":
      return to(state, state, REPORT_STATUS);
    case "help":
      return to(state, state, notify("help"));
  }
}

/**
 * Pure transition function of the consent lifecycle. Forgotten behaves like
 * New for any later event: the identity starts over without history.
 */
export function transition(state: ConversationState, event: ConversationEvent): Transition {
  return event.type === "message"
    ? onMessage(state, event.consent)
    : onCommand(state, event.command);
}

export function hasEffect(
  result: Transition,
  type: ConversationEffect["type"],
): boolean {
  return result.effects.some((e) => e.type === type);
}
