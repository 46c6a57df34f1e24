import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfig } from "./config";
import { ConfigError } from "./errors";

const VALID_YAML = `
timezone: America/Chicago
apis:
  openweather_key: test-weather-key
  sparkpost_key: test-mail-key
location:
  city: Springfield
  country_code: US
email:
  recipient: reader@example.com
  from_address: briefing@example.com
  subject: Your Morning Briefing
news:
  max_articles: 5
  summary_sentences: 2
  feeds:
    - title: Example Wire
      url: https://feeds.example.com/wire.xml
calendar:
  client_id: test-client
  client_secret: test-secret
  refresh_token: test-refresh
output:
  dir: out
`;

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "briefing-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads and validates a YAML file", async () => {
    const file = path.join(dir, "config.yml");
    await fs.writeFile(file, VALID_YAML, "utf8");

    const config = await loadConfig(file);

    expect(config.apis.openweather_key).toBe("test-weather-key");
    expect(config.location).toEqual({ city: "Springfield", country_code: "US", units: "imperial" });
    expect(config.news.max_articles).toBe(5);
    expect(config.news.feeds).toEqual([{ title: "Example Wire", url: "https://feeds.example.com/wire.xml" }]);
    expect(config.calendar?.calendar_id).toBe("primary");
    expect(config.opencode).toEqual({ model: "openai/gpt-4o-mini", timeout_ms: 60_000 });
    expect(config.output.dir).toBe(path.resolve(process.cwd(), "out"));
    expect(config.logging.level).toBe("info");
  });

  it("reports a missing file", async () => {
    const file = path.join(dir, "nope.yml");

    await expect(loadConfig(file)).rejects.toThrow(`Config file not found: ${file}`);
  });

  it("reports unparseable YAML", async () => {
    const file = path.join(dir, "config.yml");
    await fs.writeFile(file, "apis: [unclosed", "utf8");

    await expect(loadConfig(file)).rejects.toThrow(/^Failed to parse YAML/);
  });

  it("lists every missing section", async () => {
    const file = path.join(dir, "config.yml");
    await fs.writeFile(file, "apis:\n  openweather_key: test\n", "utf8");

    const error = await loadConfig(file).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigError);
    const message = error instanceof ConfigError ? error.message : "";
    expect(message).toContain("- apis.sparkpost_key: Required");
    expect(message).toContain("- location: Required");
    expect(message).toContain("- email: Required");
    expect(message).toContain("- news: Required");
  });
});

describe("parseConfig", () => {
  const base = {
    apis: { openweather_key: "k", sparkpost_key: "k" },
    location: { city: "Springfield", country_code: "US" },
    email: { recipient: "reader@example.com", from_address: "briefing@example.com", subject: "Hi" },
    news: { feeds: [{ title: "Wire", url: "https://feeds.example.com/wire.xml" }] }
  };

  it("applies defaults", () => {
    const config = parseConfig(base, "/srv/briefing");

    expect(config.timezone).toBeNull();
    expect(config.calendar).toBeNull();
    expect(config.news.max_articles).toBe(10);
    expect(config.news.summary_sentences).toBe(3);
  });

  it("resolves relative paths against the base directory", () => {
    const config = parseConfig({ ...base, output: { dir: "out", template: "t/briefing.html" }, logging: { dir: "l" } }, "/srv/briefing");

    expect(config.output).toEqual({ dir: "/srv/briefing/out", template: "/srv/briefing/t/briefing.html" });
    expect(config.logging.dir).toBe("/srv/briefing/l");
  });

  it("rejects an empty feed list", () => {
    expect(() => parseConfig({ ...base, news: { feeds: [] } })).toThrow("- news.feeds: must have at least one feed");
  });

  it("rejects an unknown time zone", () => {
    expect(() => parseConfig({ ...base, timezone: "Mars/Olympus" })).toThrow(
      "- timezone: must be an IANA time zone such as Europe/Paris"
    );
  });
});
