import { describe, expect, it } from "vitest";
import { parseCliArgs } from "./cli-args";
import { CONFIG_PATH } from "./lib/constants";

describe("parseCliArgs", () => {
  it("defaults to config.yml and a real send", () => {
    expect(parseCliArgs([])).toEqual({ configPath: CONFIG_PATH, dryRun: false, debug: false, help: false });
  });

  it("reads every flag", () => {
    expect(parseCliArgs(["--config", "alt.yml", "--dry-run", "--debug"])).toEqual({
      configPath: "alt.yml",
      dryRun: true,
      debug: true,
      help: false
    });
    expect(parseCliArgs(["--config=other.yml"]).configPath).toBe("other.yml");
  });

  it("rejects a missing config path", () => {
    expect(() => parseCliArgs(["--config"])).toThrow("--config needs a file path");
    expect(() => parseCliArgs(["--config", "--debug"])).toThrow("--config needs a file path");
  });

  it("rejects unknown arguments", () => {
    expect(() => parseCliArgs(["--send-now"])).toThrow("Unknown argument: --send-now");
  });
});
