import ora, { type Ora } from "ora";

export interface StepReporter {
  start(text: string): void;
  update(text: string): void;
  succeed(text: string): void;
  warn(text: string): void;
  fail(text: string): void;
}

export const silentReporter: StepReporter = {
  start: () => {},
  update: () => {},
  succeed: () => {},
  warn: () => {},
  fail: () => {}
};

/**
 * One spinner per step. While a spinner is active, console warnings and
 * errors are pushed onto their own line so they don't share the spinner row.
 */
export function createSpinnerReporter(): StepReporter & { dispose(): void } {
  let spinner: Ora | null = null;

  const originalWarn = console.warn.bind(console);
  const originalError = console.error.bind(console);
  console.warn = (...args: unknown[]) => {
    if (spinner && spinner.isSpinning) {
      process.stdout.write("\n");
    }
    originalWarn(...args);
  };
  console.error = (...args: unknown[]) => {
    if (spinner && spinner.isSpinning) {
      process.stdout.write("\n");
    }
    originalError(...args);
  };

  return {
    start(text) {
      spinner?.stop();
      spinner = ora(text).start();
    },
    update(text) {
      if (spinner) spinner.text = text;
    },
    succeed(text) {
      spinner?.succeed(text);
    },
    warn(text) {
      if (spinner?.isSpinning) spinner.warn(text);
      else ora().warn(text);
    },
    fail(text) {
      if (spinner?.isSpinning) spinner.fail(text);
      else ora().fail(text);
    },
    dispose() {
      spinner?.stop();
      console.warn = originalWarn;
      console.error = originalError;
    }
  };
}
