import { readConcurrency, runPool, withRetry, withTimeout, type Sleep } from "./lib/async";
import { describeError, SummarizerError } from "./lib/errors";
import { silentLogger, type Logger } from "./lib/logger";
import type { Article } from "./lib/types";
import { htmlToPlainText } from "./news";
import { buildSummaryPrompt } from "./summary-prompt";

export const NO_CONTENT_SUMMARY = "No content available for summarization.";

const SUMMARY_CONCURRENCY = readConcurrency("SUMMARY_CONCURRENCY", 3, 10);

// Attempts per article (override with env SUMMARY_RETRIES=1..5)
const SUMMARY_RETRIES = (() => {
  const v = Number(process.env.SUMMARY_RETRIES);
  if (Number.isFinite(v) && v >= 1) return Math.min(Math.floor(v), 5);
  return 3;
})();

export interface SummariseDeps {
  complete: (prompt: string) => Promise<string>;
  logger?: Logger;
  sleep?: Sleep;
  attempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
}

export interface SummariseOptions {
  sentences: number;
  concurrency?: number;
  /** Called after each article, successful or not. */
  onProgress?: (done: number, total: number, article: Article) => void;
}

/**
 * Asks the model for an N-sentence summary. Refusal-style replies and request
 * errors are retried with backoff.
 */
export async function summariseArticle(
  text: string,
  sentences: number,
  deps: SummariseDeps,
  title?: string
): Promise<string> {
  const logger = deps.logger ?? silentLogger;
  const attempts = deps.attempts ?? SUMMARY_RETRIES;
  const prompt = buildSummaryPrompt({ text, sentences, title });

  try {
    return await withRetry(
      async () => {
        const raw = await withTimeout(deps.complete(prompt), deps.timeoutMs ?? 60_000, "OpenCode request");
        const cleaned = normaliseModelOutput(raw);
        if (!cleaned) {
          throw new Error("Empty model response");
        }
        if (isRefusal(cleaned)) {
          throw new Error(`Refusal-style content: "${cleaned.slice(0, 140)}"`);
        }
        return cleaned;
      },
      {
        attempts,
        baseDelayMs: deps.baseDelayMs ?? 500,
        sleep: deps.sleep,
        onRetry: (error, attempt) => {
          logger.debug(`Summary attempt ${attempt}/${attempts} failed: ${describeError(error)}`);
        }
      }
    );
  } catch (error) {
    throw new SummarizerError(`Failed to summarize article after ${attempts} attempts: ${describeError(error)}`, {
      cause: error
    });
  }
}

/**
 * Returns new article records carrying `ai_summary`, in input order. A failed
 * article falls back to its plain-text feed summary.
 */
export async function summariseArticles(
  articles: readonly Article[],
  options: SummariseOptions,
  deps: SummariseDeps
): Promise<Article[]> {
  const logger = deps.logger ?? silentLogger;
  const results: Article[] = articles.map((article) => ({ ...article }));
  let completed = 0;

  await runPool(articles, options.concurrency ?? SUMMARY_CONCURRENCY, async (article, idx) => {
    const text = article.content || article.summary || article.title;
    let aiSummary: string;
    if (!text.trim()) {
      aiSummary = NO_CONTENT_SUMMARY;
    } else {
      try {
        aiSummary = await summariseArticle(text, options.sentences, deps, article.title);
      } catch (error) {
        logger.warn(`Summary failed for "${article.title}": ${describeError(error)}`);
        aiSummary = htmlToPlainText(article.summary);
      }
    }
    results[idx] = { ...article, ai_summary: aiSummary };
    completed++;
    options.onProgress?.(completed, articles.length, results[idx]);
  });

  return results;
}

function normaliseModelOutput(raw: string): string {
  return raw
    .replace(/\r/g, "")
    .replace(/^\s*(\*\*)?\s*(summary|résumé)\s*[:\-–—]\s*(\*\*)?\s*/i, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function isRefusal(text: string): boolean {
  const refusalPatterns = [
    /cannot (access|browse|fetch)/i,
    /as an? (ai|language) model/i,
    /do not have (access|the ability)/i,
    /i (can't|cannot) (open|visit)/i,
    /no (content|article) provided/i,
    /provide (more )?information/i,
    /not (enough|sufficient) (information|context)/i,
    /sorry,? i/i
  ];
  return refusalPatterns.some((rx) => rx.test(text));
}
