import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, type ConsoleSink } from "./logger";

function captureConsole() {
  const lines: Array<{ stream: "log" | "warn" | "error"; line: string }> = [];
  const sink: ConsoleSink = {
    log: (line) => lines.push({ stream: "log", line }),
    warn: (line) => lines.push({ stream: "warn", line }),
    error: (line) => lines.push({ stream: "error", line })
  };
  return { sink, lines };
}

describe("createLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "briefing-logs-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends records to a daily log file", async () => {
    const logger = createLogger({ dir, console: null, now: () => new Date(2024, 0, 2, 8, 3, 4) });

    logger.info("Starting morning briefing process");
    logger.warn("Weather fetch failed: timeout");

    const content = await fs.readFile(path.join(dir, "briefing_2024-01-02.log"), "utf8");
    expect(content).toBe(
      "2024-01-02 08:03:04 - briefing - INFO - Starting morning briefing process\n" +
        "2024-01-02 08:03:04 - briefing - WARN - Weather fetch failed: timeout\n"
    );
  });

  it("creates the log directory when missing", async () => {
    const nested = path.join(dir, "nested", "logs");
    const logger = createLogger({ dir: nested, console: null, now: () => new Date(2024, 5, 30, 23, 59, 59) });

    logger.error("boom");

    const content = await fs.readFile(path.join(nested, "briefing_2024-06-30.log"), "utf8");
    expect(content).toBe("2024-06-30 23:59:59 - briefing - ERROR - boom\n");
  });

  it("drops records below the configured level", () => {
    const { sink, lines } = captureConsole();
    const logger = createLogger({ level: "warn", console: sink });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    expect(lines.map((entry) => entry.stream)).toEqual(["warn", "error"]);
  });

  it("dates records in the configured zone", async () => {
    const logger = createLogger({
      dir,
      console: null,
      timeZone: "America/New_York",
      now: () => new Date(Date.UTC(2024, 0, 2, 3, 0, 0))
    });

    logger.info("Starting morning briefing process");

    const content = await fs.readFile(path.join(dir, "briefing_2024-01-01.log"), "utf8");
    expect(content).toBe("2024-01-01 22:00:00 - briefing - INFO - Starting morning briefing process\n");
  });

  it("writes coloured glyph lines to the console", () => {
    const { sink, lines } = captureConsole();
    const logger = createLogger({ console: sink });

    logger.info("Configuration loaded");

    expect(lines).toEqual([{ stream: "log", line: "\x1b[36mℹ\x1b[0m Configuration loaded" }]);
  });

  it("shows debug records at debug level", () => {
    const { sink, lines } = captureConsole();
    const logger = createLogger({ level: "debug", console: sink });

    logger.debug("Extracting content for article 1");

    expect(lines).toEqual([{ stream: "log", line: "\x1b[90m•\x1b[0m Extracting content for article 1" }]);
  });
});
