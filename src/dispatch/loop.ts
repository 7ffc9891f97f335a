import { ZodError } from "zod";
import type { DeliveryResult, NormalizedMessage } from "../channels/adapter.js";
import type { ChannelRegistry } from "../channels/registry.js";
import { localDateKey } from "../clock/timezone.js";
import { CadenceError, type CadenceScheduler } from "../cadence/scheduler.js";
import type { DispatchConfig } from "../config/types.js";
import { parseCommand } from "../conversation/commands.js";
import { classifyConsentReply } from "../conversation/consent.js";
import { NOTICES, renderStatus, type NoticeKind } from "../conversation/notices.js";
import { pickFollowUp, renderIntro, type PersonaCatalog } from "../conversation/persona.js";
import { hasEffect, transition, type ConversationEvent } from "../conversation/state-machine.js";
import {
  identityKey,
  type Persona,
  type StoredMessage,
  type UserKey,
  type UserRecord,
} from "../conversation/types.js";
import { OfflineResponder } from "../generation/offline.js";
import type { GenerationRequest, TextGenerator } from "../generation/types.js";
import type { Logger } from "../logging/logger.js";
import type { ContentFilter } from "../policy/content-filter.js";
import type { PolicyEngine } from "../policy/engine.js";
import type { DenyReason, PolicyDecision } from "../policy/types.js";
import type { ConversationStore } from "../store/types.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { retry } from "../utils/retry.js";

export interface DispatchLoopDeps {
  store: ConversationStore;
  policy: PolicyEngine;
  scheduler: CadenceScheduler;
  generator: TextGenerator;
  /** Screens generated text; flagged text is replaced by `fallback`'s. */
  contentFilter: ContentFilter;
  fallback?: TextGenerator;
  registry: ChannelRegistry;
  personas: PersonaCatalog;
  logger: Logger;
  config: DispatchConfig;
  /** Assigned to users on creation. */
  defaultTimezone: string;
  mutex?: KeyedMutex;
  clock?: () => number;
}

export type InboundOutcome =
  | "intro"
  | "replied"
  | "notice"
  | "recorded"
  | "dropped"
  | "failed";

export type DueOutcome = "sent" | "denied" | "failed" | "skipped";

export interface ScanReport {
  readonly due: number;
  readonly sent: number;
  readonly denied: number;
  readonly failed: number;
  readonly skipped: number;
}

export interface LoopStats {
  sent: number;
  replies: number;
  failed: number;
  skipped: number;
  /** Generated texts replaced or dropped by the content filter. */
  filtered: number;
  denied: Record<DenyReason, number>;
  ticks: number;
  lastTickAt: number | null;
}

type Denied = Extract<PolicyDecision, { allowed: false }>;

type PreparedInbound =
  | { readonly kind: "done"; readonly outcome: InboundOutcome }
  | {
      readonly kind: "reply";
      readonly userId: number;
      readonly persona: Persona;
      readonly history: StoredMessage[];
    };

function emptyDenials(): Record<DenyReason, number> {
  return { no_consent: 0, quiet_hours: 0, rate_limited: 0, repetitive: 0, paused: 0 };
}

/**
 * Drives inbound handling and the due-contact scan. Everything that reads
 * then writes one user's row runs under that user's lock; generation runs
 * outside it and policy is evaluated again before anything is committed.
 */
export class DispatchLoop {
  private readonly store: ConversationStore;
  private readonly policy: PolicyEngine;
  private readonly scheduler: CadenceScheduler;
  private readonly generator: TextGenerator;
  private readonly contentFilter: ContentFilter;
  private readonly fallback: TextGenerator;
  private readonly registry: ChannelRegistry;
  private readonly personas: PersonaCatalog;
  private readonly logger: Logger;
  private readonly config: DispatchConfig;
  private readonly defaultTimezone: string;
  private readonly mutex: KeyedMutex;
  private readonly clock: () => number;

  private readonly inFlight = new Set<string>();
  private readonly counters: LoopStats;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: DispatchLoopDeps) {
    this.store = deps.store;
    this.policy = deps.policy;
    this.scheduler = deps.scheduler;
    this.generator = deps.generator;
    this.contentFilter = deps.contentFilter;
    this.fallback = deps.fallback ?? new OfflineResponder();
    this.registry = deps.registry;
    this.personas = deps.personas;
    this.logger = deps.logger;
    this.config = deps.config;
    this.defaultTimezone = deps.defaultTimezone;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.clock = deps.clock ?? Date.now;

    this.counters = {
      sent: 0,
      replies: 0,
      failed: 0,
      skipped: 0,
      filtered: 0,
      denied: emptyDenials(),
      ticks: 0,
      lastTickAt: null,
    };
  }

  start(): void {
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.logger.error({ err }, "Due scan failed");
      });
    }, this.config.scanIntervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.config.scanIntervalMs }, "Dispatch loop started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info("Dispatch loop stopped");
  }

  stats(): LoopStats {
    return { ...this.counters, denied: { ...this.counters.denied } };
  }

  // ── Inbound ──

  async handleInbound(msg: NormalizedMessage): Promise<InboundOutcome> {
    const key: UserKey = { platform: msg.platform, platformUserId: msg.platformUserId };
    const lockKey = identityKey(key);

    const prepared = await this.mutex.runExclusive(lockKey, () => this.applyInbound(key, msg));
    if (prepared.kind === "done") return prepared.outcome;

    // Generation may be slow; nothing is held while it runs
    const text = await this.generateScreened(lockKey, {
      persona: prepared.persona,
      history: prepared.history,
      mode: "reply",
    });

    return this.mutex.runExclusive(lockKey, () => this.commitReply(prepared.userId, text));
  }

  private async applyInbound(key: UserKey, msg: NormalizedMessage): Promise<PreparedInbound> {
    const now = this.clock();
    const existing = await this.withStore(() => this.store.getUser(key));
    const from = existing?.state ?? "new";
    const command = parseCommand(msg.text);
    const event: ConversationEvent = command
      ? { type: "command", command }
      : {
          type: "message",
          consent: from === "awaiting_consent" ? classifyConsentReply(msg.text) : "neutral",
        };
    const result = transition(from, event);
    const next = result.next;

    this.logger.debug(
      { user: identityKey(key), from, next, event: command ?? "message" },
      "Conversation transition",
    );

    if (hasEffect(result, "erase_conversation")) {
      if (existing) {
        await this.withStore(() => this.store.deleteConversation(existing.id));
      }
      this.logger.info({ user: identityKey(key) }, "Conversation forgotten");
      let outcome: InboundOutcome = "recorded";
      for (const effect of result.effects) {
        if (effect.type !== "notify") continue;
        const delivery = await this.notify(key, null, effect.notice);
        outcome = delivery.ok ? "notice" : "failed";
      }
      return { kind: "done", outcome };
    }
    if (next === "forgotten") {
      throw new Error(`Transition from ${from} to forgotten without erasing`);
    }

    let user = await this.withStore(() =>
      this.store.getOrCreateUser(
        key,
        {
          username: msg.username,
          timezone: this.defaultTimezone,
          persona: this.personas.defaultId,
        },
        now,
      ),
    );

    if (command === null) {
      await this.withStore(() => this.store.appendMessage(user.id, "user", msg.text, msg.timestamp));
    } else if (user.unreachable) {
      await this.withStore(() => this.store.setUnreachable(user.id, false));
    }

    if (next !== from) {
      await this.withStore(() => this.store.setState(user.id, next));
    }
    user = { ...user, state: next, unreachable: false };

    if (hasEffect(result, "cancel_schedule")) {
      await this.withStore(() => this.store.setNextContact(user.id, null));
    }

    let outcome: InboundOutcome = "recorded";
    for (const effect of result.effects) {
      if (effect.type === "notify") {
        const delivery = await this.notify(user, user.id, effect.notice);
        outcome = delivery.ok ? "notice" : "failed";
      } else if (effect.type === "report_status") {
        const delivery = await this.deliver(user, user.id, this.statusText(user, now));
        outcome = delivery.ok ? "notice" : "failed";
      } else if (effect.type === "send_intro") {
        outcome = await this.sendIntro(user, now);
      }
    }

    if (hasEffect(result, "reply")) {
      const history = await this.withStore(() =>
        this.store.recentMessages(user.id, this.config.historyLimit),
      );
      return {
        kind: "reply",
        userId: user.id,
        persona: this.personas.resolve(user.persona),
        history,
      };
    }

    if (hasEffect(result, "schedule_cadence")) {
      await this.scheduleNext(user, now);
    }
    return { kind: "done", outcome };
  }

  private async sendIntro(user: UserRecord, now: number): Promise<InboundOutcome> {
    const text = renderIntro(this.personas.resolve(user.persona), user.username);
    const delivery = await this.deliver(user, user.id, text);
    if (!delivery.ok) return "failed";
    await this.withStore(() => this.store.appendMessage(user.id, "agent", text, now));
    return "intro";
  }

  private statusText(user: UserRecord, now: number): string {
    return renderStatus({
      state: user.state,
      timezone: user.timezone,
      nextContact: user.nextScheduledContact,
      sentToday: this.policy.effectiveDailyCount(user, now),
      dailyLimit: this.policy.dailyLimit,
    });
  }

  private async commitReply(userId: number, generated: string | null): Promise<InboundOutcome> {
    const now = this.clock();
    const user = await this.withStore(() => this.store.getUserById(userId));

    // Forgotten or paused while the reply was being generated
    if (!user || user.state !== "active") {
      this.logger.info({ userId, state: user?.state ?? "forgotten" }, "Reply discarded");
      return "dropped";
    }
    if (generated === null) {
      await this.scheduleNext(user, now);
      return "dropped";
    }
    const text = generated;

    const decision = this.policy.evaluate(
      { user, history: await this.agentHistory(user.id) },
      { text, kind: "reply" },
      now,
    );
    if (!decision.allowed) {
      this.recordDenial(user, decision, "reply");
      await this.scheduleNext(user, now);
      return "dropped";
    }

    const delivery = await this.deliver(user, user.id, text);
    if (!delivery.ok) return "failed";

    await this.withStore(() => this.store.appendMessage(user.id, "agent", text, now));
    this.counters.replies++;
    await this.scheduleNext(user, now);
    return "replied";
  }

  // ── Due scan ──

  async tick(): Promise<ScanReport> {
    const now = this.clock();
    this.counters.ticks++;
    this.counters.lastTickAt = now;

    const due = await this.withStore(() =>
      this.store.listDueUsers(now, this.config.scanBatchSize),
    );
    const outcomes = await Promise.all(due.map((user) => this.processDueGuarded(user, now)));

    const report: ScanReport = {
      due: due.length,
      sent: outcomes.filter((o) => o === "sent").length,
      denied: outcomes.filter((o) => o === "denied").length,
      failed: outcomes.filter((o) => o === "failed").length,
      skipped: outcomes.filter((o) => o === "skipped").length,
    };
    if (report.due > 0) {
      this.logger.info(report, "Due scan complete");
    }
    return report;
  }

  private async processDueGuarded(user: UserRecord, scanAt: number): Promise<DueOutcome> {
    const key = identityKey(user);
    // A slower, earlier scan still owns this user
    if (this.inFlight.has(key)) {
      this.counters.skipped++;
      return "skipped";
    }

    this.inFlight.add(key);
    try {
      const outcome = await this.processDue(user.id, key, scanAt);
      if (outcome === "skipped") this.counters.skipped++;
      return outcome;
    } catch (err) {
      // Nothing was committed, so the contact stays due for the next tick
      this.counters.failed++;
      this.logger.error({ err, user: key }, "Proactive contact failed");
      return "failed";
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async processDue(userId: number, key: string, scanAt: number): Promise<DueOutcome> {
    const prepared = await this.mutex.runExclusive(key, async () => {
      const now = this.clock();
      const user = await this.withStore(() => this.store.getUserById(userId));
      if (!this.stillDue(user, scanAt)) return null;

      const persona = this.personas.resolve(user.persona);
      const agentHistory = await this.agentHistory(user.id);
      const hint = pickFollowUp(
        persona,
        this.policy.recentAgentTexts({ user, history: agentHistory }),
        this.policy.similarity,
      );

      const decision = this.policy.evaluate(
        { user, history: agentHistory },
        { text: hint, kind: "proactive" },
        now,
      );
      // Repetition is judged on the generated text, not the template
      if (!decision.allowed && decision.reason !== "repetitive") {
        await this.handleDenial(user, decision, now);
        return "denied" as const;
      }

      const history = await this.withStore(() =>
        this.store.recentMessages(user.id, this.config.historyLimit),
      );
      return { persona, hint, history };
    });

    if (prepared === null) return "skipped";
    if (prepared === "denied") return "denied";

    const text = await this.generateScreened(key, {
      persona: prepared.persona,
      history: prepared.history,
      mode: "follow_up",
      hint: prepared.hint,
    });

    return this.mutex.runExclusive(key, () => this.commitProactive(userId, text, scanAt));
  }

  private async commitProactive(
    userId: number,
    generated: string | null,
    scanAt: number,
  ): Promise<DueOutcome> {
    const now = this.clock();
    const user = await this.withStore(() => this.store.getUserById(userId));
    // Paused, forgotten, replied to or rescheduled during generation
    if (!this.stillDue(user, scanAt)) {
      this.logger.info({ userId }, "Proactive contact cancelled before send");
      return "skipped";
    }
    if (generated === null) {
      // Nothing sendable: move on to the next cadence slot
      this.counters.failed++;
      await this.scheduleNext(user, now);
      return "failed";
    }
    const text = generated;

    const decision = this.policy.evaluate(
      { user, history: await this.agentHistory(user.id) },
      { text, kind: "proactive" },
      now,
    );
    if (!decision.allowed) {
      await this.handleDenial(user, decision, now);
      return "denied";
    }

    const today = localDateKey(now, user.timezone);
    const slot = await this.withStore(() =>
      this.store.reserveDailySlot(user.id, today, this.policy.dailyLimit),
    );
    if (!slot.reserved) {
      await this.handleDenial(
        user,
        { allowed: false, reason: "rate_limited", detail: `${slot.count}/${this.policy.dailyLimit} sent today` },
        now,
      );
      return "denied";
    }

    const delivery = await this.deliver(user, user.id, text);
    if (!delivery.ok) {
      // Only a committed send counts toward the limit
      await this.withStore(() => this.store.releaseDailySlot(user.id, today));
      this.counters.failed++;
      return "failed";
    }

    await this.withStore(() => this.store.appendMessage(user.id, "agent", text, now));
    const next = await this.scheduleNext(user, now);
    this.counters.sent++;
    this.logger.info(
      { user: identityKey(user), count: slot.count, next: next === null ? null : new Date(next).toISOString() },
      "Proactive contact sent",
    );
    return "sent";
  }

  private stillDue(user: UserRecord | null, scanAt: number): user is UserRecord {
    return (
      user !== null &&
      user.state === "active" &&
      !user.unreachable &&
      user.nextScheduledContact !== null &&
      user.nextScheduledContact <= scanAt
    );
  }

  // ── Shared steps ──

  private async handleDenial(user: UserRecord, decision: Denied, now: number): Promise<void> {
    this.recordDenial(user, decision, "proactive");
    if (user.state === "active") {
      // From the denial time, so a blocked contact cannot spin every tick
      await this.scheduleNext(user, now);
    } else {
      await this.withStore(() => this.store.setNextContact(user.id, null));
    }
  }

  private recordDenial(user: UserRecord, decision: Denied, kind: "proactive" | "reply"): void {
    this.counters.denied[decision.reason]++;
    this.logger.info(
      { user: identityKey(user), kind, reason: decision.reason, detail: decision.detail },
      "Message denied by policy",
    );
  }

  private async scheduleNext(user: UserRecord, now: number): Promise<number | null> {
    let next: number | null;
    try {
      next = this.scheduler.computeNextContact(user, now);
    } catch (err) {
      if (!(err instanceof CadenceError)) throw err;
      this.logger.warn({ err, user: identityKey(user) }, "No next contact scheduled");
      next = null;
    }
    await this.withStore(() => this.store.setNextContact(user.id, next));
    return next;
  }

  /**
   * Generated text that trips the content filter is replaced by the
   * fallback's answer; null when that trips it too.
   */
  private async generateScreened(user: string, request: GenerationRequest): Promise<string | null> {
    const text = await this.generator.generate(request);
    const verdict = this.contentFilter.check(text);
    if (verdict.clean) return text;

    this.counters.filtered++;
    this.logger.warn(
      { user, mode: request.mode, flag: verdict.flag, match: verdict.match },
      "Generated text blocked by content filter",
    );
    const fallback = await this.fallback.generate(request);
    if (this.contentFilter.check(fallback).clean) return fallback;

    this.logger.warn({ user, mode: request.mode }, "Fallback text blocked too, nothing sent");
    return null;
  }

  private agentHistory(userId: number): Promise<StoredMessage[]> {
    return this.withStore(() =>
      this.store.recentMessages(userId, this.policy.repetitionWindow, "agent"),
    );
  }

  private notify(target: UserKey, userId: number | null, notice: NoticeKind): Promise<DeliveryResult> {
    return this.deliver(target, userId, NOTICES[notice]);
  }

  /** Sends through the user's platform; refusals mark the user unreachable. */
  private async deliver(
    target: UserKey,
    userId: number | null,
    text: string,
  ): Promise<DeliveryResult> {
    const adapter = this.registry.get(target.platform);
    const result: DeliveryResult = adapter
      ? await adapter.send(target.platformUserId, text)
      : { ok: false, reason: "error", error: `No adapter for ${target.platform}` };

    if (result.ok) return result;

    this.logger.warn(
      { user: identityKey(target), reason: result.reason, error: result.error },
      "Delivery failed",
    );
    if (userId !== null && result.reason !== "error") {
      await this.withStore(() => this.store.setUnreachable(userId, true));
      await this.withStore(() => this.store.setNextContact(userId, null));
    }
    return result;
  }

  private withStore<T>(fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      maxAttempts: 2,
      baseDelayMs: this.config.storeRetryDelayMs,
      // A row that fails validation will fail again
      shouldRetry: (err) => !(err instanceof ZodError),
      onRetry: (err) => {
        this.logger.warn({ err }, "Store operation failed, retrying");
      },
    });
  }
}
