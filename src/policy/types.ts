import type { StoredMessage, UserRecord } from "../conversation/types.js";

export type DenyReason =
  | "no_consent"
  | "quiet_hours"
  | "rate_limited"
  | "repetitive"
  | "paused";

export const DENY_REASONS: readonly DenyReason[] = [
  "no_consent",
  "quiet_hours",
  "rate_limited",
  "repetitive",
  "paused",
];

export type PolicyDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: DenyReason; readonly detail?: string };

/**
 * `reply` answers a message the user just sent; `proactive` is an
 * agent-initiated follow-up.
 */
export type CandidateKind = "proactive" | "reply";

export interface CandidateMessage {
  readonly text: string;
  readonly kind: CandidateKind;
}

export interface PolicySubject {
  readonly user: UserRecord;
  /** Chronological history; only agent messages are compared. */
  readonly history: readonly StoredMessage[];
}
