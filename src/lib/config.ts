import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { isValidTimeZone } from "./clock";
import { LOG_DIR, OUTPUT_DIR, TEMPLATE_PATH } from "./constants";
import { ConfigError, describeError } from "./errors";
import type { BriefingConfig } from "./types";

const nonEmpty = z.string().trim().min(1, "must not be empty");

const configSchema = z.object({
  timezone: z
    .string()
    .refine(isValidTimeZone, { message: "must be an IANA time zone such as Europe/Paris" })
    .nullable()
    .default(null),
  apis: z.object({
    openweather_key: nonEmpty,
    sparkpost_key: nonEmpty
  }),
  location: z.object({
    city: nonEmpty,
    country_code: nonEmpty,
    units: z.enum(["imperial", "metric", "standard"]).default("imperial")
  }),
  email: z.object({
    recipient: z.string().email(),
    from_address: z.string().email(),
    subject: nonEmpty
  }),
  news: z.object({
    max_articles: z.number().int().min(1).max(50).default(10),
    summary_sentences: z.number().int().min(1).max(10).default(3),
    feeds: z
      .array(
        z.object({
          title: nonEmpty,
          url: z.string().url()
        })
      )
      .min(1, "must have at least one feed")
  }),
  calendar: z
    .object({
      client_id: nonEmpty,
      client_secret: nonEmpty,
      refresh_token: nonEmpty,
      calendar_id: nonEmpty.default("primary")
    })
    .nullable()
    .default(null),
  opencode: z
    .object({
      model: nonEmpty.default("openai/gpt-4o-mini"),
      timeout_ms: z.number().int().min(1).max(300_000).default(60_000)
    })
    .default({}),
  output: z
    .object({
      dir: nonEmpty.default(OUTPUT_DIR),
      template: nonEmpty.default(TEMPLATE_PATH)
    })
    .default({}),
  logging: z
    .object({
      dir: nonEmpty.default(LOG_DIR),
      level: z.enum(["debug", "info", "warn", "error"]).default("info")
    })
    .default({})
});

export function parseConfig(raw: unknown, baseDir: string = process.cwd()): BriefingConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Configuration is invalid:\n${formatIssues(result.error)}`);
  }
  const config = result.data;
  return {
    ...config,
    output: {
      dir: path.resolve(baseDir, config.output.dir),
      template: path.resolve(baseDir, config.output.template)
    },
    logging: {
      ...config.logging,
      dir: path.resolve(baseDir, config.logging.dir)
    }
  };
}

/**
 * Reads and validates a YAML configuration file. Relative output, template and
 * log paths resolve against the working directory.
 */
export async function loadConfig(configPath: string): Promise<BriefingConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(
        `Config file not found: ${configPath}. Copy config.example.yml to config.yml and customise your settings.`,
        { cause: error }
      );
    }
    throw new ConfigError(`Failed to read config file: ${describeError(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${describeError(error)}`, { cause: error });
  }
  return parseConfig(parsed);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `- ${where}: ${issue.message}`;
    })
    .join("\n");
}
