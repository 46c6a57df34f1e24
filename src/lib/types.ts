export type ContextScalar = string | number | boolean | null | undefined;

export type ContextValue = ContextScalar | readonly Context[];

export interface Context {
  readonly [field: string]: ContextValue;
}

export interface WeatherSnapshot {
  temperature: number;
  temp_min: number;
  temp_max: number;
  condition: string;
  description: string;
}

export interface HourlySlot {
  time: string;
  temperature: number | null;
  rain_chance: number;
  condition: string;
}

export interface CalendarEvent {
  title: string;
  start_time: string;
  end_time: string;
  location: string;
  all_day: boolean;
}

export interface Article {
  title: string;
  link: string;
  published: string;
  summary: string;
  source: string;
  content?: string;
  ai_summary?: string;
}

export interface BriefingData {
  weather: WeatherSnapshot | null;
  hourly: HourlySlot[];
  events: CalendarEvent[];
  articles: Article[];
}

export interface FeedSource {
  title: string;
  url: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BriefingConfig {
  timezone: string | null;
  apis: {
    openweather_key: string;
    sparkpost_key: string;
  };
  location: {
    city: string;
    country_code: string;
    units: "imperial" | "metric" | "standard";
  };
  email: {
    recipient: string;
    from_address: string;
    subject: string;
  };
  news: {
    max_articles: number;
    summary_sentences: number;
    feeds: FeedSource[];
  };
  calendar: {
    client_id: string;
    client_secret: string;
    refresh_token: string;
    calendar_id: string;
  } | null;
  opencode: {
    model: string;
    timeout_ms: number;
  };
  output: {
    dir: string;
    template: string;
  };
  logging: {
    dir: string;
    level: LogLevel;
  };
}
