import fs from "node:fs";
import path from "node:path";
import { formatDateStamp, formatDateTimeStamp, zonedClock } from "./clock";
import type { LogLevel } from "./types";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const COLORS = {
  reset: "\x1b[0m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  detail: "\x1b[90m"
} as const;

export const GLYPHS = {
  briefing: "◆",
  weather: "☁",
  calendar: "▦",
  feed: "→",
  summary: "✦",
  article: "•",
  mail: "✉",
  success: "✓",
  warn: "⚠",
  error: "✗",
  info: "ℹ",
  folder: "▸",
  timer: "⏱"
} as const;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_STYLE: Record<LogLevel, { color: string; glyph: string }> = {
  debug: { color: COLORS.detail, glyph: GLYPHS.article },
  info: { color: COLORS.info, glyph: GLYPHS.info },
  warn: { color: COLORS.warn, glyph: GLYPHS.warn },
  error: { color: COLORS.error, glyph: GLYPHS.error }
};

export interface ConsoleSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for the daily `briefing_YYYY-MM-DD.log` file; no file when omitted. */
  dir?: string | null;
  name?: string;
  now?: () => Date;
  /** Zone for file names and record timestamps; the host zone when unset. */
  timeZone?: string | null;
  console?: ConsoleSink | null;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const name = options.name ?? "briefing";
  const now = options.now ?? (() => new Date());
  const sink = options.console === undefined ? console : options.console;
  const dir = options.dir ?? null;
  if (dir) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const write = (level: LogLevel, message: string) => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    if (sink) {
      const { color, glyph } = LEVEL_STYLE[level];
      const line = `${color}${glyph}${COLORS.reset} ${message}`;
      if (level === "error") sink.error(line);
      else if (level === "warn") sink.warn(line);
      else sink.log(line);
    }
    if (dir) {
      const clock = zonedClock(now(), options.timeZone);
      const file = path.join(dir, `briefing_${formatDateStamp(clock)}.log`);
      const record = `${formatDateTimeStamp(clock)} - ${name} - ${level.toUpperCase()} - ${message}\n`;
      fs.appendFileSync(file, record, "utf8");
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export function formatSuccess(message: string): string {
  return `${COLORS.success}${GLYPHS.success}${COLORS.reset} ${message}`;
}

export function formatDetail(icon: string, message: string): string {
  return `${COLORS.detail}${icon} ${message}${COLORS.reset}`;
}
