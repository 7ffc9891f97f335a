import { localDateKey, toLocal } from "../clock/timezone.js";
import type { PolicyConfig } from "../config/types.js";
import type { UserRecord } from "../conversation/types.js";
import { isQuietHour } from "./quiet-hours.js";
import { createSimilarityPolicy, type SimilarityPolicy } from "./similarity.js";
import type {
  CandidateMessage,
  DenyReason,
  PolicyDecision,
  PolicySubject,
} from "./types.js";

interface PolicyCheck {
  readonly stage: string;
  /** Reported when the check itself throws. */
  readonly failReason: DenyReason;
  /** Replies to a user-initiated message skip these. */
  readonly proactiveOnly: boolean;
  run(subject: PolicySubject, candidate: CandidateMessage, now: number): PolicyDecision;
}

const ALLOW: PolicyDecision = { allowed: true };

function deny(reason: DenyReason, detail?: string): PolicyDecision {
  return detail === undefined ? { allowed: false, reason } : { allowed: false, reason, detail };
}

/**
 * Gate for every outbound message. Checks run in a fixed order (consent,
 * quiet hours, rate limit, anti-repetition) and the first failure is
 * reported. Evaluation never mutates the user; counters move only when a
 * send is committed through the store.
 */
export class PolicyEngine {
  readonly similarity: SimilarityPolicy;
  private readonly checks: readonly PolicyCheck[];

  constructor(
    private readonly config: PolicyConfig,
    similarity?: SimilarityPolicy,
  ) {
    this.similarity = similarity ?? createSimilarityPolicy(config.antiRepetition);
    this.checks = [
      {
        stage: "consent",
        failReason: "no_consent",
        proactiveOnly: true,
        run: (subject) => this.checkConsent(subject.user),
      },
      {
        stage: "quiet_hours",
        failReason: "quiet_hours",
        proactiveOnly: true,
        run: (subject, _candidate, now) => this.checkQuietHours(subject.user, now),
      },
      {
        stage: "rate_limit",
        failReason: "rate_limited",
        proactiveOnly: true,
        run: (subject, _candidate, now) => this.checkRateLimit(subject.user, now),
      },
      {
        stage: "anti_repetition",
        failReason: "repetitive",
        proactiveOnly: false,
        run: (subject, candidate) => this.checkRepetition(subject, candidate),
      },
    ];
  }

  get dailyLimit(): number {
    return this.config.maxDailyMessagesPerUser;
  }

  get repetitionWindow(): number {
    return this.config.antiRepetition.window;
  }

  evaluate(subject: PolicySubject, candidate: CandidateMessage, now: number): PolicyDecision {
    for (const check of this.checks) {
      if (check.proactiveOnly && candidate.kind === "reply") continue;

      let decision: PolicyDecision;
      try {
        decision = check.run(subject, candidate, now);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return deny(check.failReason, `${check.stage} check failed: ${message}`);
      }
      if (!decision.allowed) return decision;
    }
    return ALLOW;
  }

  /** Daily count as seen at `now`: zero once the local date has moved past the window. */
  effectiveDailyCount(user: UserRecord, now: number): number {
    const today = localDateKey(now, user.timezone);
    return user.countWindowStart === today ? user.dailyMessageCount : 0;
  }

  /** The last `window` agent texts, oldest first. */
  recentAgentTexts(subject: PolicySubject): string[] {
    return subject.history
      .filter((m) => m.sender === "agent")
      .slice(-this.config.antiRepetition.window)
      .map((m) => m.text);
  }

  private checkConsent(user: UserRecord): PolicyDecision {
    if (user.state === "active") return ALLOW;
    if (user.state === "paused") return deny("paused");
    return deny("no_consent", `conversation is ${user.state}`);
  }

  private checkQuietHours(user: UserRecord, now: number): PolicyDecision {
    const { start, end } = this.config.quietHours;
    if (start === end) {
      return deny("quiet_hours", `quiet hours ${start}-${end} cover the whole day`);
    }
    const hour = toLocal(now, user.timezone).hour;
    return isQuietHour(hour, this.config.quietHours)
      ? deny("quiet_hours", `local hour ${hour} is inside ${start}-${end}`)
      : ALLOW;
  }

  private checkRateLimit(user: UserRecord, now: number): PolicyDecision {
    const count = this.effectiveDailyCount(user, now);
    const limit = this.config.maxDailyMessagesPerUser;
    return count >= limit ? deny("rate_limited", `${count}/${limit} sent today`) : ALLOW;
  }

  private checkRepetition(subject: PolicySubject, candidate: CandidateMessage): PolicyDecision {
    return this.similarity.isRepetitive(candidate.text, this.recentAgentTexts(subject))
      ? deny("repetitive", `matches a recent message under ${this.similarity.name}`)
      : ALLOW;
  }
}
