/** Character range within a rule line. */
export interface Span {
  start: number;
  end: number;
}

export type ReservationErrorKind = "pattern" | "rule" | "config";

/** Base class for all errors produced while parsing or evaluating schedules. */
export class ReservationError extends Error {
  readonly kind: ReservationErrorKind;

  constructor(
    kind: ReservationErrorKind,
    message: string,
    options?: { cause?: Error },
  ) {
    super(message);
    this.name = "ReservationError";
    this.kind = kind;
    this.cause = options?.cause;
  }
}

/**
 * A cron pattern that is syntactically invalid, or one that never matches
 * within the search horizon when it is evaluated.
 */
export class InvalidPatternError extends ReservationError {
  /** The pattern text as written. */
  readonly pattern: string;
  /** The offending field text, when a single field is at fault. */
  readonly field?: string;

  constructor(message: string, pattern: string, field?: string) {
    super("pattern", message);
    this.name = "InvalidPatternError";
    this.pattern = pattern;
    this.field = field;
  }
}

/** A rule line that cannot be parsed. Always fatal to the whole schedule. */
export class MalformedRuleError extends ReservationError {
  /** 1-based line number in the schedule text. */
  readonly line: number;
  readonly reason: string;
  /** The trimmed rule line. */
  readonly input: string;
  readonly span?: Span;
  /** Number of `:`-separated fields, when the field count was wrong. */
  readonly fieldCount?: number;

  constructor(
    line: number,
    reason: string,
    input: string,
    options?: { span?: Span; fieldCount?: number; cause?: Error },
  ) {
    super("rule", `line ${line}: ${reason}`, { cause: options?.cause });
    this.name = "MalformedRuleError";
    this.line = line;
    this.reason = reason;
    this.input = input;
    this.span = options?.span;
    this.fieldCount = options?.fieldCount;
  }

  displayRich(): string {
    let out = `error: ${this.message}`;
    if (this.span) {
      out += `\n  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
    }
    return out;
  }
}

/** Schedule options that fail validation. */
export class ConfigurationError extends ReservationError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigurationError";
  }
}
