import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { withRetry, type Sleep } from "./lib/async";
import { pad2, zonedClock } from "./lib/clock";
import { DeliveryError, describeError } from "./lib/errors";

const TRANSMISSIONS_URL = "https://api.sparkpost.com/api/v1/transmissions";

export interface EmailOptions {
  apiKey: string;
  from: string;
  to: string;
  subject: string;
  maxRetries?: number;
  timeoutMs?: number;
}

export interface DeliveryDeps {
  fetch?: typeof fetch;
  sleep?: Sleep;
}

const transmissionSchema = z.object({
  results: z.object({
    total_accepted_recipients: z.number().default(0),
    id: z.string().optional()
  })
});

/** Sends the briefing as an HTML e-mail through SparkPost. Resolves with the transmission id, when given. */
export async function sendEmail(options: EmailOptions, html: string, deps: DeliveryDeps = {}): Promise<string | null> {
  const fetchImpl = deps.fetch ?? fetch;
  const attempts = options.maxRetries ?? 3;

  try {
    return await withRetry(
      async () => {
        const response = await fetchImpl(TRANSMISSIONS_URL, {
          method: "POST",
          headers: {
            Authorization: options.apiKey,
            "Content-Type": "application/json"
          },
          body: JSON.stringify({
            recipients: [{ address: options.to }],
            content: { from: options.from, subject: options.subject, html }
          }),
          signal: AbortSignal.timeout(options.timeoutMs ?? 30_000)
        });
        if (!response.ok) {
          throw new Error(`SparkPost API error: Status code ${response.status}`);
        }
        const parsed = transmissionSchema.safeParse(await response.json());
        if (!parsed.success || parsed.data.results.total_accepted_recipients <= 0) {
          throw new Error("Failed to send email: No recipients accepted");
        }
        return parsed.data.results.id ?? null;
      },
      { attempts, sleep: deps.sleep }
    );
  } catch (error) {
    throw new DeliveryError(`Failed to send email after ${attempts} attempts: ${describeError(error)}`, {
      cause: error
    });
  }
}

// "briefing_20240101_070509.html"
export function briefingFileName(now: Date, timeZone?: string | null): string {
  const clock = zonedClock(now, timeZone);
  const date = `${clock.year}${pad2(clock.month)}${pad2(clock.day)}`;
  const time = `${pad2(clock.hour)}${pad2(clock.minute)}${pad2(clock.second)}`;
  return `briefing_${date}_${time}.html`;
}

/** Writes the rendered briefing under `dir` and returns the file path. */
export async function saveBriefing(html: string, dir: string, now: Date = new Date(), timeZone?: string | null): Promise<string> {
  try {
    await fs.mkdir(dir, { recursive: true });
    const target = path.join(dir, briefingFileName(now, timeZone));
    await fs.writeFile(target, html, "utf8");
    return target;
  } catch (error) {
    throw new DeliveryError(`Failed to save briefing to ${dir}: ${describeError(error)}`, { cause: error });
  }
}
