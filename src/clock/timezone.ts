export class TimezoneError extends Error {
  constructor(
    readonly timezone: string,
    options?: { cause?: unknown },
  ) {
    super(`Unknown or unsupported timezone: ${timezone}`, options);
    this.name = "TimezoneError";
  }
}

export interface LocalDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

export interface LocalDateTime extends LocalDate {
  /** 0-23 */
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timezone);
  if (cached) return cached;

  let fmt: Intl.DateTimeFormat;
  try {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
  } catch (err) {
    throw new TimezoneError(timezone, { cause: err });
  }
  formatters.set(timezone, fmt);
  return fmt;
}

export function isValidTimezone(timezone: string): boolean {
  if (timezone.trim() === "") return false;
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

/** Wall-clock reading of `instant` (epoch ms) in an IANA timezone. */
export function toLocal(instant: number, timezone: string): LocalDateTime {
  const parts = formatterFor(timezone).formatToParts(new Date(instant));
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = Number(parts.find((p) => p.type === type)?.value);
    if (Number.isNaN(value)) throw new TimezoneError(timezone);
    return value;
  };

  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    // Some ICU builds still report midnight as 24
    hour: read("hour") % 24,
    minute: read("minute"),
    second: read("second"),
  };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatLocalDate(date: LocalDate): string {
  return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

/** Local wall clock of `instant` as `YYYY-MM-DD HH:mm`. */
export function formatLocalDateTime(instant: number, timezone: string): string {
  const local = toLocal(instant, timezone);
  return `${formatLocalDate(local)} ${pad(local.hour)}:${pad(local.minute)}`;
}

/** Local calendar date of `instant` as `YYYY-MM-DD`. */
export function localDateKey(instant: number, timezone: string): string {
  return formatLocalDate(toLocal(instant, timezone));
}

/** Offset of the timezone from UTC at `instant`, in ms (east positive). */
export function offsetAt(instant: number, timezone: string): number {
  const local = toLocal(instant, timezone);
  const wall = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  return wall - Math.floor(instant / 1000) * 1000;
}

/**
 * UTC instant of a local wall-clock time. Inside a DST gap the result lands
 * on the shifted side of the transition.
 */
export function fromLocal(local: LocalDateTime, timezone: string): number {
  const wall = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  const guess = wall - offsetAt(wall, timezone);
  return wall - offsetAt(guess, timezone);
}

export function addLocalDays(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}
