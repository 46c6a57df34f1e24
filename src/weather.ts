import { z } from "zod";
import { withRetry, type Sleep } from "./lib/async";
import { formatHourLabel, zonedClock } from "./lib/clock";
import { describeError, WeatherError } from "./lib/errors";
import type { HourlySlot, WeatherSnapshot } from "./lib/types";
import { roundHalfEven } from "./render/formatters";

const WEATHER_URL = "https://api.openweathermap.org/data/2.5/weather";
const FORECAST_URL = "https://api.openweathermap.org/data/2.5/forecast";
const FORECAST_SLOTS = 4;

export interface WeatherOptions {
  apiKey: string;
  city: string;
  countryCode: string;
  units?: "imperial" | "metric" | "standard";
  timeZone?: string | null;
  timeoutMs?: number;
  maxRetries?: number;
}

export interface WeatherDeps {
  fetch?: typeof fetch;
  sleep?: Sleep;
}

const currentSchema = z.object({
  main: z.object({
    temp: z.number(),
    temp_min: z.number(),
    temp_max: z.number()
  }),
  weather: z
    .array(
      z.object({
        main: z.string(),
        description: z.string()
      })
    )
    .min(1)
});

const forecastSchema = z.object({
  list: z.array(
    z.object({
      dt: z.number(),
      pop: z.number().optional(),
      main: z.object({ temp: z.number() }),
      weather: z.array(z.object({ main: z.string() })).min(1)
    })
  )
});

export async function fetchWeather(options: WeatherOptions, deps: WeatherDeps = {}): Promise<WeatherSnapshot> {
  const data = await requestWeatherJson(WEATHER_URL, options, deps, { label: "Weather", failure: "weather" });
  const parsed = currentSchema.safeParse(data);
  if (!parsed.success) {
    throw new WeatherError(`Malformed API response: missing expected field ${firstIssuePath(parsed.error)}`);
  }
  const { main, weather } = parsed.data;
  return {
    temperature: main.temp,
    temp_min: main.temp_min,
    temp_max: main.temp_max,
    condition: weather[0].main,
    description: weather[0].description
  };
}

/**
 * Next forecast slots (three-hour steps), labelled like "3PM" in the
 * configured time zone.
 */
export async function fetchHourlyForecast(options: WeatherOptions, deps: WeatherDeps = {}): Promise<HourlySlot[]> {
  const data = await requestWeatherJson(FORECAST_URL, options, deps, {
    label: "Forecast",
    failure: "forecast",
    extra: { cnt: "40" }
  });
  const parsed = forecastSchema.safeParse(data);
  if (!parsed.success) {
    throw new WeatherError(`Malformed API response: missing expected field ${firstIssuePath(parsed.error)}`);
  }
  return parsed.data.list.slice(0, FORECAST_SLOTS).map((entry) => ({
    time: formatHourLabel(zonedClock(new Date(entry.dt * 1000), options.timeZone).hour),
    temperature: roundHalfEven(entry.main.temp),
    rain_chance: Math.trunc((entry.pop ?? 0) * 100),
    condition: entry.weather[0].main
  }));
}

async function requestWeatherJson(
  url: string,
  options: WeatherOptions,
  deps: WeatherDeps,
  request: { label: string; failure: string; extra?: Record<string, string> }
): Promise<unknown> {
  const fetchImpl = deps.fetch ?? fetch;
  const params = new URLSearchParams({
    q: `${options.city},${options.countryCode}`,
    appid: options.apiKey,
    units: options.units ?? "imperial",
    ...request.extra
  });
  const attempts = options.maxRetries ?? 3;

  try {
    return await withRetry(
      async () => {
        const response = await fetchImpl(`${url}?${params.toString()}`, {
          signal: AbortSignal.timeout(options.timeoutMs ?? 10_000)
        });
        if (response.status === 401) {
          throw new WeatherError("Weather API error: Invalid API key");
        }
        if (!response.ok) {
          throw new WeatherError(`${request.label} API error: Status code ${response.status}`);
        }
        const body: unknown = await response.json();
        return body;
      },
      {
        attempts,
        sleep: deps.sleep,
        retryable: (error) => !(error instanceof WeatherError)
      }
    );
  } catch (error) {
    if (error instanceof WeatherError) {
      throw error;
    }
    throw new WeatherError(`Failed to fetch ${request.failure}: ${describeError(error)}`, { cause: error });
  }
}

function firstIssuePath(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue && issue.path.length > 0 ? `'${issue.path.join(".")}'` : "'<root>'";
}
