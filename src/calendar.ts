import { z } from "zod";
import { zonedClock, zonedMidnight } from "./lib/clock";
import { CalendarError, describeError } from "./lib/errors";
import type { CalendarEvent } from "./lib/types";

const TOKEN_URL = "https://oauth2.googleapis.com/token";
const EVENTS_URL = "https://www.googleapis.com/calendar/v3/calendars";

export interface CalendarOptions {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  calendarId?: string;
  timeoutMs?: number;
  /** IANA zone whose calendar day is "today"; the host zone when unset. */
  timeZone?: string | null;
}

export interface CalendarDeps {
  fetch?: typeof fetch;
}

const tokenSchema = z.object({ access_token: z.string().min(1) });

const eventTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional()
});

const eventsSchema = z.object({
  items: z
    .array(
      z.object({
        summary: z.string().optional(),
        location: z.string().optional(),
        start: eventTimeSchema,
        end: eventTimeSchema
      })
    )
    .default([])
});

/**
 * Today's events (the day in `options.timeZone`) from a Google calendar, ordered by start
 * time. All-day events are the ones whose start carries a date only.
 */
export async function fetchCalendarEvents(
  options: CalendarOptions,
  now: Date = new Date(),
  deps: CalendarDeps = {}
): Promise<CalendarEvent[]> {
  const fetchImpl = deps.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const accessToken = await refreshAccessToken(options, fetchImpl, timeoutMs);

  const { timeMin, timeMax } = dayRange(now, options.timeZone);
  const params = new URLSearchParams({
    timeMin,
    timeMax,
    singleEvents: "true",
    orderBy: "startTime"
  });
  const calendarId = encodeURIComponent(options.calendarId ?? "primary");

  let body: unknown;
  try {
    const response = await fetchImpl(`${EVENTS_URL}/${calendarId}/events?${params.toString()}`, {
      headers: { Authorization: `Bearer ${accessToken}` },
      signal: AbortSignal.timeout(timeoutMs)
    });
    if (!response.ok) {
      throw new CalendarError(`Calendar API error: Status code ${response.status}`);
    }
    body = await response.json();
  } catch (error) {
    if (error instanceof CalendarError) {
      throw new CalendarError(`Failed to fetch calendar events: ${error.message}`, { cause: error });
    }
    throw new CalendarError(`Unexpected error fetching events: ${describeError(error)}`, { cause: error });
  }

  const parsed = eventsSchema.safeParse(body);
  if (!parsed.success) {
    throw new CalendarError("Unexpected error fetching events: malformed calendar response");
  }

  return parsed.data.items.map((event) => ({
    title: event.summary ?? "No Title",
    start_time: event.start.dateTime ?? event.start.date ?? "",
    end_time: event.end.dateTime ?? event.end.date ?? "",
    location: event.location ?? "",
    all_day: event.start.date !== undefined
  }));
}

async function refreshAccessToken(options: CalendarOptions, fetchImpl: typeof fetch, timeoutMs: number): Promise<string> {
  try {
    const response = await fetchImpl(TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        client_id: options.clientId,
        client_secret: options.clientSecret,
        refresh_token: options.refreshToken,
        grant_type: "refresh_token"
      }).toString(),
      signal: AbortSignal.timeout(timeoutMs)
    });
    if (!response.ok) {
      throw new Error(`token endpoint returned status ${response.status}`);
    }
    const parsed = tokenSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("token response has no access_token");
    }
    return parsed.data.access_token;
  } catch (error) {
    throw new CalendarError(`Failed to refresh credentials: ${describeError(error)}`, { cause: error });
  }
}

export function dayRange(now: Date, timeZone?: string | null): { timeMin: string; timeMax: string } {
  const { year, month, day } = zonedClock(now, timeZone);
  const start = zonedMidnight(year, month, day, timeZone);
  const end = zonedMidnight(year, month, day + 1, timeZone);
  return { timeMin: start.toISOString(), timeMax: end.toISOString() };
}
