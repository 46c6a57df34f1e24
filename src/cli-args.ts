import { CONFIG_PATH } from "./lib/constants";
import { ConfigError } from "./lib/errors";

export interface CliArgs {
  configPath: string;
  dryRun: boolean;
  debug: boolean;
  help: boolean;
}

export const USAGE = [
  "Usage: tsx scripts/build-briefing.ts [options]",
  "",
  "Options:",
  "  --config <path>  Configuration file (default: config.yml)",
  "  --dry-run        Save the briefing under the output directory instead of sending it",
  "  --debug          Verbose logging",
  "  -h, --help       Show this message"
].join("\n");

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { configPath: CONFIG_PATH, dryRun: false, debug: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--dry-run") {
      args.dryRun = true;
    } else if (arg === "--debug") {
      args.debug = true;
    } else if (arg === "-h" || arg === "--help") {
      args.help = true;
    } else if (arg === "--config") {
      const value = argv[i + 1];
      if (!value || value.startsWith("--")) {
        throw new ConfigError("--config needs a file path");
      }
      args.configPath = value;
      i++;
    } else if (arg.startsWith("--config=")) {
      args.configPath = arg.slice("--config=".length);
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }
  return args;
}
