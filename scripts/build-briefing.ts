#!/usr/bin/env tsx
import { parseCliArgs, USAGE } from "../src/cli-args";
import { describeError } from "../src/lib/errors";
import { formatDetail, formatSuccess, GLYPHS, type ConsoleSink } from "../src/lib/logger";
import { createSpinnerReporter } from "../src/lib/progress";
import { runBriefing } from "../src/run-briefing";

async function main() {
  const startTime = Date.now();
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`${describeError(error)}\n\n${USAGE}`);
    process.exit(1);
  }
  if (args.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const reporter = createSpinnerReporter();
  // Spinners carry progress; info lines only reach the console with --debug.
  const sink: ConsoleSink = {
    log: (line) => {
      if (args.debug) console.log(line);
    },
    warn: (line) => console.warn(line),
    error: (line) => console.error(line)
  };

  let ok = false;
  try {
    ok = await runBriefing({
      configPath: args.configPath,
      dryRun: args.dryRun,
      debug: args.debug,
      reporter,
      console: sink
    });
  } catch (error) {
    console.error(`\n${GLYPHS.error} Error:`, error);
  } finally {
    reporter.dispose();
  }

  const seconds = Math.round((Date.now() - startTime) / 1000);
  if (ok) {
    console.log(`\n${formatSuccess(args.dryRun ? "Briefing saved (dry run)" : "Briefing delivered")}`);
    console.log(`  ${formatDetail(GLYPHS.timer, `Generated in ${seconds}s`)}\n`);
  }
  process.exit(ok ? 0 : 1);
}

void main();
