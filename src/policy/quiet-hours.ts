import { addLocalDays, fromLocal, toLocal } from "../clock/timezone.js";

export interface QuietHoursWindow {
  /** First blocked local hour, 0-23. */
  readonly start: number;
  /** First allowed local hour after the window, 0-23. */
  readonly end: number;
}

const DST_STEP_MS = 15 * 60_000;
const DST_MAX_STEPS = 4 * 48;

/** start == end leaves no allowed hour at all. */
export function coversWholeDay(window: QuietHoursWindow): boolean {
  return window.start === window.end;
}

/** Containment in [start, end) taken modulo 24, so 22→8 blocks 22..23 and 0..7. */
export function isQuietHour(hour: number, window: QuietHoursWindow): boolean {
  const { start, end } = window;
  if (start === end) return true;
  if (start < end) return hour >= start && hour < end;
  return hour >= start || hour < end;
}

export function isQuietAt(instant: number, window: QuietHoursWindow, timezone: string): boolean {
  return isQuietHour(toLocal(instant, timezone).hour, window);
}

/**
 * First instant at or after `instant` outside the window: `instant` itself
 * when it is already allowed, otherwise the local `end:00` that closes the
 * window it falls in.
 */
export function nextAllowedInstant(
  instant: number,
  window: QuietHoursWindow,
  timezone: string,
): number {
  if (coversWholeDay(window)) {
    throw new RangeError(`Quiet hours ${window.start}-${window.end} cover the whole day`);
  }

  const local = toLocal(instant, timezone);
  if (!isQuietHour(local.hour, window)) return instant;

  // In a wrapping window the evening part closes on the next local day
  const closesToday = window.start < window.end || local.hour < window.end;
  const date = closesToday ? local : addLocalDays(local, 1);
  let candidate = fromLocal(
    { year: date.year, month: date.month, day: date.day, hour: window.end, minute: 0, second: 0 },
    timezone,
  );

  // DST shifts can leave the converted wall clock short of the boundary
  for (let step = 0; step < DST_MAX_STEPS; step++) {
    if (candidate >= instant && !isQuietAt(candidate, window, timezone)) break;
    candidate += DST_STEP_MS;
  }
  return candidate;
}
