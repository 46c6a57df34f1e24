export type BriefingErrorCode =
  | "MALFORMED_TEMPLATE"
  | "TEMPLATE_SOURCE_UNAVAILABLE"
  | "CONFIG"
  | "WEATHER"
  | "CALENDAR"
  | "NEWS"
  | "SUMMARIZER"
  | "DELIVERY";

export class BriefingError extends Error {
  readonly code: BriefingErrorCode;

  constructor(code: BriefingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type MalformedTemplateReason = "unexpected-close" | "mismatched-close" | "unclosed-section" | "empty-tag";

/**
 * Raised when section tags do not pair up. `offset` is the character index of
 * the offending tag in the template source.
 */
export class MalformedTemplateError extends BriefingError {
  readonly reason: MalformedTemplateReason;
  readonly offset: number;
  readonly tag: string;

  constructor(reason: MalformedTemplateReason, tag: string, offset: number, message: string) {
    super("MALFORMED_TEMPLATE", `${message} (at offset ${offset})`);
    this.reason = reason;
    this.tag = tag;
    this.offset = offset;
  }
}

export class TemplateSourceUnavailableError extends BriefingError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("TEMPLATE_SOURCE_UNAVAILABLE", `Template source unavailable: ${path} (${describeError(cause)})`, { cause });
    this.path = path;
  }
}

export class ConfigError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export class WeatherError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("WEATHER", message, options);
  }
}

export class CalendarError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CALENDAR", message, options);
  }
}

export class NewsError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NEWS", message, options);
  }
}

export class SummarizerError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SUMMARIZER", message, options);
  }
}

export class DeliveryError extends BriefingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DELIVERY", message, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
