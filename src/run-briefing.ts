import path from "node:path";
import { fetchCalendarEvents } from "./calendar";
import { sendEmail, saveBriefing } from "./deliver";
import { readConcurrency, runPool } from "./lib/async";
import { loadConfig as loadConfigFile } from "./lib/config";
import { CONFIG_PATH } from "./lib/constants";
import { describeError } from "./lib/errors";
import { createLogger, GLYPHS, type ConsoleSink, type Logger } from "./lib/logger";
import { silentReporter, type StepReporter } from "./lib/progress";
import type { Article, BriefingConfig, BriefingData, CalendarEvent, HourlySlot, WeatherSnapshot } from "./lib/types";
import { extractArticleContent, fetchNews, htmlToPlainText } from "./news";
import { createOpenCodeCompleter } from "./oc-client";
import { assembleBriefing } from "./render/assemble";
import { summariseArticles } from "./summarise-with-oc";
import { fetchHourlyForecast, fetchWeather } from "./weather";

const HYDRATE_CONCURRENCY = readConcurrency("HYDRATE_CONCURRENCY", 6, 12);

/** Everything the run talks to outside the process, bound to one configuration. */
export interface BriefingServices {
  fetchWeather(): Promise<WeatherSnapshot>;
  fetchHourlyForecast(): Promise<HourlySlot[]>;
  /** Only called when a calendar is configured. */
  fetchCalendarEvents(now: Date): Promise<CalendarEvent[]>;
  fetchNews(): Promise<Article[]>;
  extractArticleContent(url: string): Promise<string>;
  summariseArticles(articles: readonly Article[], onProgress: (done: number, total: number) => void): Promise<Article[]>;
  sendEmail(html: string): Promise<unknown>;
  close(): Promise<void>;
}

export type ServiceFactory = (config: BriefingConfig, logger: Logger) => BriefingServices;

export interface RunOptions {
  configPath?: string;
  dryRun?: boolean;
  debug?: boolean;
  now?: () => Date;
  reporter?: StepReporter;
  /** Where console log lines go; `null` keeps them to the log file. */
  console?: ConsoleSink | null;
  loadConfig?: (configPath: string) => Promise<BriefingConfig>;
  createLogger?: (config: BriefingConfig | null) => Logger;
}

export const createDefaultServices: ServiceFactory = (config, logger) => {
  const weatherOptions = {
    apiKey: config.apis.openweather_key,
    city: config.location.city,
    countryCode: config.location.country_code,
    units: config.location.units,
    timeZone: config.timezone
  };
  const completer = createOpenCodeCompleter({ model: config.opencode.model, logger });
  const calendar = config.calendar;

  return {
    fetchWeather: () => fetchWeather(weatherOptions),
    fetchHourlyForecast: () => fetchHourlyForecast(weatherOptions),
    fetchCalendarEvents: async (now) =>
      calendar
        ? fetchCalendarEvents(
            {
              clientId: calendar.client_id,
              clientSecret: calendar.client_secret,
              refreshToken: calendar.refresh_token,
              calendarId: calendar.calendar_id,
              timeZone: config.timezone
            },
            now
          )
        : [],
    fetchNews: () => fetchNews(config.news.feeds, config.news.max_articles, { logger }),
    extractArticleContent: (url) => extractArticleContent(url),
    summariseArticles: (articles, onProgress) =>
      summariseArticles(
        articles,
        { sentences: config.news.summary_sentences, onProgress },
        {
          complete: (prompt) => completer.complete(prompt),
          logger,
          timeoutMs: config.opencode.timeout_ms
        }
      ),
    sendEmail: (html) =>
      sendEmail(
        {
          apiKey: config.apis.sparkpost_key,
          from: config.email.from_address,
          to: config.email.recipient,
          subject: config.email.subject
        },
        html
      ),
    close: () => completer.close()
  };
};

/**
 * One briefing run: gather, summarise, render, then send or (dry run) save.
 * Collaborator failures degrade the briefing; configuration, template and
 * delivery failures end the run with `false`.
 */
export async function runBriefing(
  options: RunOptions = {},
  services: ServiceFactory = createDefaultServices
): Promise<boolean> {
  const now = (options.now ?? (() => new Date()))();
  const reporter = options.reporter ?? silentReporter;
  const configPath = options.configPath ?? CONFIG_PATH;
  const makeLogger =
    options.createLogger ??
    ((config: BriefingConfig | null) =>
      createLogger({
        level: options.debug ? "debug" : config?.logging.level ?? "info",
        dir: config?.logging.dir ?? null,
        timeZone: config?.timezone ?? null,
        now: options.now,
        console: options.console
      }));

  let logger = makeLogger(null);
  logger.info("Starting morning briefing process");

  let config: BriefingConfig;
  try {
    reporter.start(`${GLYPHS.briefing} Loading configuration...`);
    logger.info(`Loading configuration from ${configPath}`);
    config = await (options.loadConfig ?? loadConfigFile)(configPath);
    logger = makeLogger(config);
    logger.info("Configuration loaded successfully");
    reporter.succeed(`Configuration loaded (${config.news.feeds.length} feeds, model: ${config.opencode.model})`);
  } catch (error) {
    reporter.fail("Configuration failed");
    logger.error(`Configuration error: ${describeError(error)}`);
    return false;
  }

  const bound = services(config, logger);
  try {
    const data = await gather(bound, config, now, logger, reporter);

    let html: string;
    try {
      reporter.start("Building briefing...");
      logger.info("Building email HTML");
      html = await assembleBriefing(data, now, { templatePath: config.output.template, timeZone: config.timezone });
      logger.info("Email HTML built successfully");
      reporter.succeed("Briefing rendered");
    } catch (error) {
      reporter.fail("Briefing render failed");
      logger.error(`Failed to build email HTML: ${describeError(error)}`);
      return false;
    }

    if (options.dryRun) {
      try {
        const target = await saveBriefing(html, config.output.dir, now, config.timezone);
        logger.info(`Dry run: Email saved to ${target}`);
        reporter.succeed(`${GLYPHS.folder} Saved ${path.relative(process.cwd(), target) || target}`);
        return true;
      } catch (error) {
        reporter.fail("Saving the briefing failed");
        logger.error(describeError(error));
        return false;
      }
    }

    try {
      reporter.start(`${GLYPHS.mail} Sending email to ${config.email.recipient}...`);
      logger.info("Sending email");
      await bound.sendEmail(html);
      logger.info("Email sent successfully");
      reporter.succeed(`Email sent to ${config.email.recipient}`);
      return true;
    } catch (error) {
      reporter.fail("Email delivery failed");
      logger.error(`Failed to send email: ${describeError(error)}`);
      return false;
    }
  } catch (error) {
    logger.error(`Unexpected error in run: ${describeError(error)}`);
    return false;
  } finally {
    await bound.close().catch((error: unknown) => {
      logger.debug(`Closing services failed: ${describeError(error)}`);
    });
  }
}

async function gather(
  services: BriefingServices,
  config: BriefingConfig,
  now: Date,
  logger: Logger,
  reporter: StepReporter
): Promise<BriefingData> {
  let weather: WeatherSnapshot | null = null;
  let hourly: HourlySlot[] = [];
  reporter.start(`${GLYPHS.weather} Fetching weather for ${config.location.city}...`);
  try {
    logger.info("Fetching weather data");
    weather = await services.fetchWeather();
    logger.info(`Weather fetched: ${weather.condition}, ${weather.temperature}°`);
    try {
      hourly = await services.fetchHourlyForecast();
      logger.info(`Hourly forecast fetched: ${hourly.length} time slots`);
    } catch (error) {
      logger.warn(`Hourly forecast fetch failed: ${describeError(error)}`);
    }
    reporter.succeed(`Weather: ${weather.condition}, ${hourly.length} forecast slots`);
  } catch (error) {
    logger.warn(`Weather fetch failed: ${describeError(error)}`);
    reporter.warn("Weather unavailable");
  }

  let events: CalendarEvent[] = [];
  if (config.calendar) {
    reporter.start(`${GLYPHS.calendar} Fetching calendar events...`);
    try {
      logger.info("Fetching calendar events");
      events = await services.fetchCalendarEvents(now);
      logger.info(`Found ${events.length} calendar events`);
      reporter.succeed(`${events.length} calendar events today`);
    } catch (error) {
      logger.warn(`Calendar fetch failed: ${describeError(error)}`);
      reporter.warn("Calendar unavailable");
    }
  } else {
    logger.warn("Calendar not configured; skipping events");
  }

  let articles: Article[] = [];
  reporter.start(`${GLYPHS.feed} Fetching RSS feeds (${config.news.feeds.length})...`);
  try {
    logger.info("Fetching news articles");
    articles = await services.fetchNews();
    logger.info(`Fetched ${articles.length} news articles`);
    reporter.succeed(`Fetched ${articles.length} articles from ${config.news.feeds.length} feeds`);
  } catch (error) {
    logger.warn(`News fetch failed: ${describeError(error)}`);
    reporter.warn("News unavailable");
  }

  if (articles.length > 0) {
    articles = await hydrate(services, articles, logger, reporter);

    reporter.start(`${GLYPHS.summary} Generating AI summaries (0/${articles.length})`);
    logger.info("Generating AI summaries");
    try {
      articles = await services.summariseArticles(articles, (done, total) => {
        reporter.update(`${GLYPHS.summary} Generating AI summaries (${done}/${total})`);
      });
      logger.info(`Generated summaries for ${articles.length} articles`);
      reporter.succeed(`Generated ${articles.length} AI summaries`);
    } catch (error) {
      logger.warn(`Summarization failed: ${describeError(error)}`);
      reporter.warn("AI summaries unavailable");
    }
  }

  return { weather, hourly, events, articles };
}

async function hydrate(
  services: BriefingServices,
  articles: readonly Article[],
  logger: Logger,
  reporter: StepReporter
): Promise<Article[]> {
  const hydrated = articles.map((article) => ({ ...article }));
  let completed = 0;
  reporter.start(`Fetching full article content (0/${articles.length})`);
  logger.info("Extracting article content");

  await runPool(articles, HYDRATE_CONCURRENCY, async (article, idx) => {
    logger.debug(`Extracting content for article ${idx + 1}: ${article.title || "Unknown"}`);
    let content: string;
    try {
      content = await services.extractArticleContent(article.link);
    } catch (error) {
      logger.warn(`Failed to extract content for article ${idx + 1}: ${describeError(error)}`);
      content = htmlToPlainText(article.summary);
    }
    hydrated[idx] = { ...article, content };
    completed++;
    reporter.update(`Fetching full article content (${completed}/${articles.length})`);
  });

  reporter.succeed(`Retrieved content for ${articles.length} articles`);
  return hydrated;
}
