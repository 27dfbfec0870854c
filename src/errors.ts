import type { ZodError } from "zod";

export type ErrorCode = "CONFIG" | "LAYOUT" | "SOURCE";

/** Base class for every error the conversion pipeline raises */
export class PagewrightError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or out-of-range settings (page size, margins, rotation, DPI, CLI options) */
export class ConfigError extends PagewrightError {
  constructor(message: string) {
    super("CONFIG", message);
  }

  /** Wrap a zod validation failure, reporting its first issue */
  static fromZod(err: ZodError, context?: string): ConfigError {
    const issue = err.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    const detail = issue ? issue.message : err.message;
    const prefix = context ? `${context}: ` : "";
    return new ConfigError(`${prefix}invalid settings${where}: ${detail}`);
  }
}

export type LayoutErrorReason = "MARGINS_EXCEED_PAGE";

/** An image cannot be placed on its page */
export class LayoutError extends PagewrightError {
  readonly reason: LayoutErrorReason;
  readonly sourceId: string;

  constructor(reason: LayoutErrorReason, sourceId: string, message: string) {
    super("LAYOUT", message);
    this.reason = reason;
    this.sourceId = sourceId;
  }
}

/** Missing or unreadable input, or an empty input set */
export class SourceError extends PagewrightError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super("SOURCE", message);
    this.path = path;
  }
}
