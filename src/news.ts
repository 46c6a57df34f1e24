import Parser from "rss-parser";
import { htmlToText, type HtmlToTextOptions } from "html-to-text";
import { readConcurrency, runPool, withRetry, type Sleep } from "./lib/async";
import { USER_AGENT } from "./lib/constants";
import { describeError, NewsError } from "./lib/errors";
import { silentLogger, type Logger } from "./lib/logger";
import type { Article, FeedSource } from "./lib/types";

const MAX_CONTENT_CHARS = 5000;

const FEED_CONCURRENCY = readConcurrency("FEED_CONCURRENCY", 6, 16);

export interface FeedItem {
  title?: string;
  link?: string;
  pubDate?: string;
  isoDate?: string;
  summary?: string;
  contentSnippet?: string;
  content?: string;
}

export interface FeedReader {
  parseURL(url: string): Promise<{ items: FeedItem[] }>;
}

export interface NewsDeps {
  parser?: FeedReader;
  logger?: Logger;
}

export interface ExtractDeps {
  fetch?: typeof fetch;
  sleep?: Sleep;
  maxRetries?: number;
  timeoutMs?: number;
}

export function createFeedReader(timeoutMs = 10_000): FeedReader {
  return new Parser({
    timeout: timeoutMs,
    headers: { "User-Agent": USER_AGENT }
  });
}

/**
 * Collects entries from every feed, newest first. Feeds that fail to load are
 * logged and skipped; entries without a link are dropped.
 */
export async function fetchNews(
  feeds: readonly FeedSource[],
  maxArticles = 10,
  deps: NewsDeps = {}
): Promise<Article[]> {
  const parser = deps.parser ?? createFeedReader();
  const logger = deps.logger ?? silentLogger;
  const perFeed: Article[][] = feeds.map(() => []);

  await runPool(feeds, FEED_CONCURRENCY, async (feed, idx) => {
    try {
      const result = await parser.parseURL(feed.url);
      perFeed[idx] = result.items.flatMap((item) => toArticle(item, feed.title));
      logger.debug(`Fetched ${perFeed[idx].length} entries from "${feed.title}"`);
    } catch (error) {
      logger.warn(`Error fetching feed ${feed.url}: ${describeError(error)}`);
    }
  });

  // Feed order is kept for entries that share a timestamp.
  const articles = perFeed.flat();
  const stamps = new Map(articles.map((article) => [article, Date.parse(article.published)] as const));
  articles.sort((a, b) => compareNewestFirst(stamps.get(a) ?? NaN, stamps.get(b) ?? NaN));
  return articles.slice(0, Math.max(0, maxArticles));
}

function toArticle(item: FeedItem, source: string): Article[] {
  const link = item.link?.trim() ?? "";
  if (!link) {
    return [];
  }
  return [
    {
      title: item.title ?? "",
      link,
      published: item.pubDate ?? item.isoDate ?? "",
      summary: item.summary ?? item.contentSnippet ?? item.content ?? "",
      source
    }
  ];
}

function compareNewestFirst(a: number, b: number): number {
  const aValid = Number.isFinite(a);
  const bValid = Number.isFinite(b);
  if (aValid && bValid) return b - a;
  if (aValid) return -1;
  if (bValid) return 1;
  return 0;
}

const SKIPPED_ELEMENTS = ["script", "style", "nav", "header", "footer", "img"];

function textOptions(baseSelector: string, fallbackToDocument: boolean): HtmlToTextOptions {
  return {
    wordwrap: false,
    baseElements: { selectors: [baseSelector], returnDomByDefault: fallbackToDocument },
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      ...SKIPPED_ELEMENTS.map((selector) => ({ selector, format: "skip" }))
    ]
  };
}

/** Readable text of an HTML page: the `<article>` element when present, else `<body>`. */
export function htmlToArticleText(html: string): string {
  const fromArticle = collapse(htmlToText(html, textOptions("article", false)));
  const text = fromArticle || collapse(htmlToText(html, textOptions("body", true)));
  return text.slice(0, MAX_CONTENT_CHARS);
}

/** Feed summaries may carry markup; this flattens them to one line of text. */
export function htmlToPlainText(html: string): string {
  if (!html) {
    return "";
  }
  return collapse(
    htmlToText(html, {
      wordwrap: false,
      selectors: [
        { selector: "a", options: { ignoreHref: true } },
        { selector: "img", format: "skip" }
      ]
    })
  );
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export async function extractArticleContent(url: string, deps: ExtractDeps = {}): Promise<string> {
  const fetchImpl = deps.fetch ?? fetch;
  try {
    return await withRetry(
      async () => {
        const response = await fetchImpl(url, {
          headers: { "User-Agent": USER_AGENT },
          signal: AbortSignal.timeout(deps.timeoutMs ?? 10_000)
        });
        if (!response.ok) {
          throw new Error(`Status code ${response.status}`);
        }
        return htmlToArticleText(await response.text());
      },
      { attempts: deps.maxRetries ?? 3, sleep: deps.sleep }
    );
  } catch (error) {
    throw new NewsError(`Failed to extract content from ${url}: ${describeError(error)}`, { cause: error });
  }
}
