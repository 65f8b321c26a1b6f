// ReservationSchedule: the parsed rule text a host queries for reserved slots.

import { display } from "./display.js";
import type { Entry } from "./entry.js";
import { InvalidPatternError, MalformedRuleError } from "./error.js";
import type { ReservationLogger } from "./logger.js";
import { resolveScheduleOptions, type ScheduleOptions } from "./options.js";
import { parseRules } from "./rules.js";
import type { ReservationNode, ReservationScheduler } from "./types.js";

/** Next-change instant of a schedule that never changes. */
export const NEVER = Number.MAX_SAFE_INTEGER;

/** The only state a schedule persists: its source text. */
export interface SerializedSchedule {
  format: string;
}

export type ValidationResult =
  | { ok: true }
  | { ok: false; line: number; message: string };

export class ReservationSchedule implements ReservationScheduler {
  /** The rule text this schedule was parsed from. */
  readonly format: string;
  /** Parsed entries, in textual order. */
  readonly entries: readonly Entry[];
  private readonly logger: ReservationLogger;
  /** Whether over-reservation is worth reporting to `logger`. */
  private readonly traceExecutors: boolean;

  private constructor(
    format: string,
    entries: readonly Entry[],
    logger: ReservationLogger,
    traceExecutors: boolean,
  ) {
    this.format = format;
    this.entries = entries;
    this.logger = logger;
    this.traceExecutors = traceExecutors;
    Object.freeze(this);
  }

  /** Parse rule text. Throws `MalformedRuleError` on the first bad line. */
  static parse(format: string, options?: ScheduleOptions): ReservationSchedule {
    const resolved = resolveScheduleOptions(options);
    const entries = Object.freeze(parseRules(format, resolved));
    resolved.logger.debug("Parsed reservation schedule", {
      entries: entries.length,
      timeZone: resolved.timeZone,
    });
    return new ReservationSchedule(
      format,
      entries,
      resolved.logger,
      options?.logger !== undefined || resolved.logLevel === "verbose",
    );
  }

  /** Rebuild a schedule from its serialized form by re-parsing the text. */
  static fromJSON(
    json: SerializedSchedule,
    options?: ScheduleOptions,
  ): ReservationSchedule {
    return ReservationSchedule.parse(json.format, options);
  }

  /** Report whether rule text parses, and the first failure if not. */
  static validate(format: string, options?: ScheduleOptions): ValidationResult {
    try {
      ReservationSchedule.parse(format, options);
      return { ok: true };
    } catch (error) {
      if (error instanceof MalformedRuleError) {
        return { ok: false, line: error.line, message: error.reason };
      }
      throw error;
    }
  }

  /** Sum of every entry's reservation at `timestamp`. Never capped. */
  sizeOfReservation(node: ReservationNode, timestamp: number): number {
    let total = 0;
    for (const entry of this.entries) {
      total += this.query(entry, () => entry.sizeOfReservation(node, timestamp));
    }

    if (total > 0 && this.traceExecutors) {
      const executors = node.executorCount();
      if (total > executors) {
        this.logger.debug("Reservation exceeds node executor count", {
          reserved: total,
          executors,
          timestamp,
        });
      }
    }
    return total;
  }

  /** Earliest next change over all entries, or `NEVER` if there are none. */
  timeOfNextChange(_node: ReservationNode, timestamp: number): number {
    let next = NEVER;
    for (const entry of this.entries) {
      next = Math.min(
        next,
        this.query(entry, () => entry.timeOfNextChange(timestamp)),
      );
    }
    return next;
  }

  toJSON(): SerializedSchedule {
    return { format: this.format };
  }

  /** Render the rules in canonical form. */
  toString(): string {
    return display(this.entries);
  }

  private query(entry: Entry, evaluate: () => number): number {
    try {
      return evaluate();
    } catch (error) {
      if (error instanceof InvalidPatternError) {
        this.logger.warn("Reservation pattern could not be evaluated", {
          pattern: entry.pattern.source,
          error: error.message,
        });
      }
      throw error;
    }
  }
}

/** Report whether rule text parses, and the first failure if not. */
export function validate(
  format: string,
  options?: ScheduleOptions,
): ValidationResult {
  return ReservationSchedule.validate(format, options);
}
