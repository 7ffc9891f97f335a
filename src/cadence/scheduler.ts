import type { CadenceConfig } from "../config/types.js";
import type { UserRecord } from "../conversation/types.js";
import { coversWholeDay, nextAllowedInstant, type QuietHoursWindow } from "../policy/quiet-hours.js";

export const DAY_MS = 86_400_000;

export class CadenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CadenceError";
  }
}

export type RandomSource = () => number;

/**
 * Picks the next proactive contact: a uniform offset of minDays..maxDays,
 * pushed forward out of quiet hours in the user's local time.
 */
export class CadenceScheduler {
  constructor(
    private readonly config: CadenceConfig,
    private readonly quietHours: QuietHoursWindow,
    private readonly random: RandomSource = Math.random,
  ) {
    if (config.minDays < 1 || config.minDays > config.maxDays) {
      throw new CadenceError(
        `Invalid cadence bounds: minDays=${config.minDays}, maxDays=${config.maxDays}`,
      );
    }
  }

  /**
   * Callers reschedule after a denial by passing the denial time as `now`,
   * never the originally scheduled time.
   */
  computeNextContact(user: Pick<UserRecord, "state" | "timezone">, now: number): number {
    if (user.state !== "active") {
      throw new CadenceError(`Cannot schedule contact for a ${user.state} conversation`);
    }
    if (coversWholeDay(this.quietHours)) {
      throw new CadenceError(
        `Quiet hours ${this.quietHours.start}-${this.quietHours.end} leave no allowed time`,
      );
    }

    const { minDays, maxDays } = this.config;
    const offset = (minDays + this.random() * (maxDays - minDays)) * DAY_MS;
    const candidate = Math.round(now + offset);
    const next = nextAllowedInstant(candidate, this.quietHours, user.timezone);

    if (next <= now) {
      throw new CadenceError(`Computed contact ${next} is not after ${now}`);
    }
    return next;
  }
}
