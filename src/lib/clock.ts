export interface ZonedClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: string;
  monthName: string;
}

/**
 * Wall-clock fields of `instant` in `timeZone` (IANA name), or in the host
 * zone when none is given.
 */
export function zonedClock(instant: Date, timeZone?: string | null): ZonedClock {
  const numeric = formatParts(instant, timeZone, {
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
    second: "numeric",
    hourCycle: "h23"
  });
  const names = formatParts(instant, timeZone, { weekday: "long", month: "long" });
  return {
    year: Number(numeric.year),
    month: Number(numeric.month),
    day: Number(numeric.day),
    hour: Number(numeric.hour),
    minute: Number(numeric.minute),
    second: Number(numeric.second),
    weekday: names.weekday,
    monthName: names.month
  };
}

/**
 * The instant at which `year-month-day` begins in `timeZone` (host zone when
 * none is given). Days past the end of the month roll over.
 */
export function zonedMidnight(year: number, month: number, day: number, timeZone?: string | null): Date {
  const utcBaseline = Date.UTC(year, month - 1, day);
  const first = utcBaseline - offsetMs(utcBaseline, timeZone);
  // The offset at the baseline can differ from the one at midnight itself across a DST change.
  return new Date(utcBaseline - offsetMs(first, timeZone));
}

function offsetMs(timestamp: number, timeZone: string | null | undefined): number {
  const clock = zonedClock(new Date(timestamp), timeZone);
  const asUtc = Date.UTC(clock.year, clock.month - 1, clock.day, clock.hour, clock.minute, clock.second);
  return asUtc - timestamp;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

// "Monday, January 01, 2024"
export function formatLongDate(clock: ZonedClock): string {
  return `${clock.weekday}, ${clock.monthName} ${pad2(clock.day)}, ${clock.year}`;
}

// "07:05 AM"
export function formatClockTime(hour: number, minute: number): string {
  return `${pad2(to12Hour(hour))}:${pad2(minute)} ${meridiem(hour)}`;
}

// "3PM"
export function formatHourLabel(hour: number): string {
  return `${to12Hour(hour)}${meridiem(hour)}`;
}

// "2024-01-01"
export function formatDateStamp(clock: ZonedClock): string {
  return `${clock.year}-${pad2(clock.month)}-${pad2(clock.day)}`;
}

// "2024-01-01 07:05:09"
export function formatDateTimeStamp(clock: ZonedClock): string {
  return `${formatDateStamp(clock)} ${pad2(clock.hour)}:${pad2(clock.minute)}:${pad2(clock.second)}`;
}

export function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function to12Hour(hour: number): number {
  return hour % 12 === 0 ? 12 : hour % 12;
}

function meridiem(hour: number): "AM" | "PM" {
  return hour < 12 ? "AM" : "PM";
}

function formatParts(
  instant: Date,
  timeZone: string | null | undefined,
  options: Intl.DateTimeFormatOptions
): Record<string, string> {
  const formatter = new Intl.DateTimeFormat("en-US", { ...options, ...(timeZone ? { timeZone } : {}) });
  return Object.fromEntries(formatter.formatToParts(instant).map((part) => [part.type, part.value]));
}
