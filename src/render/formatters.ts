import { z } from "zod";
import { formatClockTime } from "../lib/clock";
import type { CalendarEvent, Context, ContextScalar, HourlySlot, WeatherSnapshot } from "../lib/types";

const DEFAULT_WEATHER_ICON = "🌤️";

// Ordered: the first keyword found in the condition wins.
const WEATHER_ICONS: ReadonlyArray<readonly [keyword: string, icon: string]> = [
  ["clear", "☀️"],
  ["rain", "🌧️"],
  ["drizzle", "🌧️"],
  ["clouds", "⛅"],
  ["cloud", "⛅"],
  ["partly", "🌤️"],
  ["thunderstorm", "⛈️"],
  ["snow", "❄️"],
  ["mist", "🌫️"],
  ["fog", "🌫️"],
  ["haze", "🌫️"]
];

export type WeatherContext =
  | { weather_available: false }
  | {
      weather_available: true;
      weather_icon: string;
      temperature: number;
      temp_min: number;
      temp_max: number;
      condition: string | null;
      description: string;
    };

export type HourlyContext = {
  time: string;
  icon: string;
  rain_chance: number;
  temperature: number;
};

export type HourlyForecastContext = {
  has_hourly_forecast: boolean;
  hourly: HourlyContext[];
};

export type EventContext = {
  title: string;
  time: string;
  location: string;
};

export type EventsContext = {
  has_events: boolean;
  events: EventContext[];
};

export type ArticleContext = { [field: string]: ContextScalar };

export type ArticlesContext = {
  has_articles: boolean;
  articles: ArticleContext[];
};

export function weatherIcon(condition: string | null | undefined): string {
  const lowered = (condition ?? "").toLowerCase();
  const match = WEATHER_ICONS.find(([keyword]) => lowered.includes(keyword));
  return match ? match[1] : DEFAULT_WEATHER_ICON;
}

export function formatWeather(weather: Partial<WeatherSnapshot> | null | undefined): WeatherContext {
  if (!weather) {
    return { weather_available: false };
  }
  return {
    weather_available: true,
    weather_icon: weatherIcon(weather.condition),
    temperature: roundHalfEven(weather.temperature ?? 0),
    temp_min: roundHalfEven(weather.temp_min ?? 0),
    temp_max: roundHalfEven(weather.temp_max ?? 0),
    condition: weather.condition ?? null,
    description: capitalise(weather.description ?? "")
  };
}

export function formatHourlyForecast(
  slots: ReadonlyArray<Partial<HourlySlot>> | null | undefined
): HourlyForecastContext {
  const hourly: HourlyContext[] = [];
  for (const slot of slots ?? []) {
    if (typeof slot.temperature !== "number") {
      continue;
    }
    hourly.push({
      time: slot.time ?? "",
      icon: weatherIcon(slot.condition),
      rain_chance: slot.rain_chance ?? 0,
      temperature: slot.temperature
    });
  }
  return { has_hourly_forecast: hourly.length > 0, hourly };
}

export function formatCalendarEvents(events: ReadonlyArray<Partial<CalendarEvent>> | null | undefined): EventsContext {
  const formatted = (events ?? []).map(
    (event): EventContext => ({
      title: event.title ?? "Untitled Event",
      time: formatEventTime(event.start_time ?? "", event.all_day ?? false),
      location: event.location ?? ""
    })
  );
  return { has_events: formatted.length > 0, events: formatted };
}

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Display label for an event start. Timestamps keep the wall-clock time of
 * their own offset (`2024-01-01T09:00:00Z` reads "09:00 AM"); anything that
 * does not parse is returned untouched.
 */
export function formatEventTime(startTime: string, allDay: boolean): string {
  if (allDay) {
    return "All Day";
  }
  const match = ISO_TIMESTAMP.exec(startTime);
  if (!match) {
    return startTime;
  }
  const [, year, month, day, hour = "0", minute = "0", second = "0"] = match;
  if (!isValidDate(Number(year), Number(month), Number(day))) {
    return startTime;
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return startTime;
  }
  return formatClockTime(Number(hour), Number(minute));
}

const articleSchema = z
  .object({
    title: z.string(),
    link: z.string()
  })
  .catchall(z.unknown());

export function formatArticles(articles: readonly unknown[] | null | undefined): ArticlesContext {
  const formatted: ArticleContext[] = [];
  for (const entry of articles ?? []) {
    const parsed = articleSchema.safeParse(entry);
    if (!parsed.success) {
      continue;
    }
    const article: ArticleContext = {};
    for (const [field, value] of Object.entries(parsed.data)) {
      if (isScalar(value)) {
        article[field] = value;
      }
    }
    formatted.push(article);
  }
  return { has_articles: formatted.length > 0, articles: formatted };
}

export function mergeContexts(...parts: Context[]): Context {
  return parts.reduce<Context>((merged, part) => ({ ...merged, ...part }), {});
}

/** Rounds halves to the nearest even integer (72.5 -> 72, 73.5 -> 74). */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function capitalise(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isScalar(value: unknown): value is ContextScalar {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}
