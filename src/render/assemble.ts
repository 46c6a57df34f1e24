import fs from "node:fs/promises";
import { formatClockTime, formatLongDate, zonedClock } from "../lib/clock";
import { TEMPLATE_PATH } from "../lib/constants";
import { TemplateSourceUnavailableError } from "../lib/errors";
import type { BriefingData, Context } from "../lib/types";
import {
  formatArticles,
  formatCalendarEvents,
  formatHourlyForecast,
  formatWeather,
  mergeContexts
} from "./formatters";
import { renderTemplate } from "./template";

export interface AssembleOptions {
  templatePath?: string;
  timeZone?: string | null;
}

export async function loadTemplate(templatePath: string = TEMPLATE_PATH): Promise<string> {
  try {
    return await fs.readFile(templatePath, "utf8");
  } catch (error) {
    throw new TemplateSourceUnavailableError(templatePath, error);
  }
}

export function buildBriefingContext(data: BriefingData, now: Date, timeZone?: string | null): Context {
  const clock = zonedClock(now, timeZone);
  return mergeContexts(
    {
      date: formatLongDate(clock),
      time: formatClockTime(clock.hour, clock.minute)
    },
    formatWeather(data.weather),
    formatHourlyForecast(data.hourly),
    formatCalendarEvents(data.events),
    formatArticles(data.articles)
  );
}

export function renderBriefing(template: string, data: BriefingData, now: Date, timeZone?: string | null): string {
  return renderTemplate(template, buildBriefingContext(data, now, timeZone));
}

/**
 * Loads the briefing template and renders it for `now`. Template read
 * failures surface as TemplateSourceUnavailableError.
 */
export async function assembleBriefing(data: BriefingData, now: Date, options: AssembleOptions = {}): Promise<string> {
  const template = await loadTemplate(options.templatePath);
  return renderBriefing(template, data, now, options.timeZone);
}
