// CronPattern: a parsed recurrence evaluated against epoch-millisecond instants.

import { Temporal } from "@js-temporal/polyfill";
import { type CronFields, parseCron } from "./cron.js";
import { InvalidPatternError } from "./error.js";
import { ceilFrom, floorFrom, matchesFields } from "./eval.js";
import { type PatternOptions, resolvePatternOptions } from "./options.js";

export const MINUTE_MS = 60_000;

/** Drop the seconds and milliseconds of an epoch-millisecond instant. */
export function truncateToMinute(timestamp: number): number {
  return Math.floor(timestamp / MINUTE_MS) * MINUTE_MS;
}

/** An offset change of the pattern's zone. `shift` > 0 skips wall time. */
interface Transition {
  at: number;
  shift: number;
}

// =============================================================================
// Wall Clock vs. Instants
// =============================================================================
// Fields are matched against wall-clock minutes, and eval.ts walks those in
// calendar order. Around an offset change that order differs from instant
// order:
//
//   - a repeated hour (shift < 0) names each of its minutes twice, once per
//     offset, and a search starting inside it never revisits the other pass;
//   - a skipped hour (shift > 0) has no instant of its own, so its minutes
//     are shifted forward by the gap and land on instants the following
//     wall times also name.
//
// floor and ceil therefore take every instant a candidate names, and when the
// result may have crossed a transition they repeat the walk from the
// transition itself and keep the better of the two.
// =============================================================================

export class CronPattern {
  /** The pattern text, trimmed. */
  readonly source: string;
  readonly timeZone: string;
  readonly searchHorizonYears: number;
  private readonly fields: CronFields;
  private readonly zone: Temporal.TimeZone;

  private constructor(
    source: string,
    fields: CronFields,
    timeZone: string,
    searchHorizonYears: number,
  ) {
    this.source = source;
    this.fields = fields;
    this.timeZone = timeZone;
    this.zone = Temporal.TimeZone.from(timeZone);
    this.searchHorizonYears = searchHorizonYears;
    Object.freeze(this);
  }

  /** Parse a 5-field cron pattern or @ macro. */
  static parse(source: string, options?: PatternOptions): CronPattern {
    const { timeZone, searchHorizonYears } = resolvePatternOptions(options);
    return new CronPattern(
      source.trim(),
      parseCron(source),
      timeZone,
      searchHorizonYears,
    );
  }

  /** Check if a pattern string is valid. */
  static validate(source: string): boolean {
    try {
      parseCron(source);
      return true;
    } catch {
      return false;
    }
  }

  /** Latest matching instant at or before `timestamp`. */
  floor(timestamp: number): number {
    const target = truncateToMinute(timestamp);
    const limitYear = this.wallClock(target).year - this.searchHorizonYears;
    const latest = this.searchBackward(
      this.wallClock(target),
      target,
      limitYear,
      timestamp,
    );

    const transition = this.previousTransition(target);
    if (
      transition === null ||
      latest >= transition.at + Math.abs(transition.shift)
    ) {
      return latest;
    }
    // Last wall minute before the change: the end of the first pass of a
    // repeated hour, or the end of a skipped one
    const before = this.wallClock(transition.at - 1);
    const skippedEnd = this.wallClock(transition.at).subtract({ minutes: 1 });
    const from =
      Temporal.PlainDateTime.compare(before, skippedEnd) >= 0
        ? before
        : skippedEnd;
    return Math.max(
      latest,
      this.searchBackward(from, target, limitYear, timestamp),
    );
  }

  /** Earliest matching instant at or after `timestamp`. */
  ceil(timestamp: number): number {
    const target = truncateToMinute(timestamp);
    const limitYear = this.wallClock(target).year + this.searchHorizonYears;

    const skipped = this.skippedWallClock(target);
    let earliest = this.searchForward(
      skipped ?? this.wallClock(target),
      target,
      limitYear,
      timestamp,
    );
    if (skipped !== null) {
      earliest = Math.min(
        earliest,
        this.searchForward(
          this.wallClock(target),
          target,
          limitYear,
          timestamp,
        ),
      );
    }

    const transition = this.nextTransition(target);
    if (transition === null || earliest < transition.at) return earliest;
    return Math.min(
      earliest,
      this.searchForward(
        this.wallClock(transition.at),
        target,
        limitYear,
        timestamp,
      ),
    );
  }

  /**
   * Check if the minute containing `timestamp` matches this pattern. A wall
   * time skipped by a forward transition matches at the instant it is
   * shifted to.
   */
  matches(timestamp: number): boolean {
    const target = truncateToMinute(timestamp);
    if (matchesFields(this.fields, this.wallClock(target))) return true;
    const skipped = this.skippedWallClock(target);
    return skipped !== null && matchesFields(this.fields, skipped);
  }

  /**
   * Returns a lazy iterator of occurrences at or after `from`.
   * Unbounded: callers must stop iterating themselves.
   */
  *occurrences(from: number): Generator<number, void, unknown> {
    let current = from;
    for (;;) {
      const next = this.ceil(current);
      // Advance cursor by 1 minute to avoid returning same occurrence
      current = next + MINUTE_MS;
      yield next;
    }
  }

  toString(): string {
    return this.source;
  }

  // --- Searches ---

  private searchBackward(
    start: Temporal.PlainDateTime,
    target: number,
    limitYear: number,
    timestamp: number,
  ): number {
    let from = start;
    for (;;) {
      const candidate = floorFrom(this.fields, from, limitYear);
      if (candidate === null) {
        throw this.horizonExceeded("before", timestamp);
      }
      const instants = this.instantsFor(candidate).filter((i) => i <= target);
      if (instants.length > 0) return instants[instants.length - 1];
      from = candidate.subtract({ minutes: 1 });
    }
  }

  private searchForward(
    start: Temporal.PlainDateTime,
    target: number,
    limitYear: number,
    timestamp: number,
  ): number {
    let from = start;
    for (;;) {
      const candidate = ceilFrom(this.fields, from, limitYear);
      if (candidate === null) {
        throw this.horizonExceeded("after", timestamp);
      }
      const instants = this.instantsFor(candidate).filter((i) => i >= target);
      if (instants.length > 0) return instants[0];
      from = candidate.add({ minutes: 1 });
    }
  }

  // --- Zone ---

  private wallClock(timestamp: number): Temporal.PlainDateTime {
    return Temporal.Instant.fromEpochMilliseconds(timestamp)
      .toZonedDateTimeISO(this.zone)
      .toPlainDateTime();
  }

  private offsetAt(timestamp: number): number {
    const instant = Temporal.Instant.fromEpochMilliseconds(timestamp);
    return this.zone.getOffsetNanosecondsFor(instant) / 1_000_000;
  }

  /**
   * Every instant a wall-clock minute names, ascending: two in a repeated
   * hour, and for a skipped one the instant it is shifted forward to.
   */
  private instantsFor(dt: Temporal.PlainDateTime): number[] {
    const possible = this.zone.getPossibleInstantsFor(dt);
    if (possible.length === 0) {
      return [
        this.zone.getInstantFor(dt, { disambiguation: "compatible" })
          .epochMilliseconds,
      ];
    }
    return possible.map((instant) => instant.epochMilliseconds);
  }

  /** The latest offset change at or before `target`. */
  private previousTransition(target: number): Transition | null {
    const transition = this.zone.getPreviousTransition(
      Temporal.Instant.fromEpochMilliseconds(target + 1),
    );
    return transition === null ? null : this.describe(transition);
  }

  /** The first offset change after `target`. */
  private nextTransition(target: number): Transition | null {
    const transition = this.zone.getNextTransition(
      Temporal.Instant.fromEpochMilliseconds(target),
    );
    return transition === null ? null : this.describe(transition);
  }

  private describe(transition: Temporal.Instant): Transition {
    const at = transition.epochMilliseconds;
    return { at, shift: this.offsetAt(at) - this.offsetAt(at - 1) };
  }

  /**
   * The skipped wall time that is shifted forward onto `target`, when
   * `target` lies within one gap after a forward transition.
   */
  private skippedWallClock(target: number): Temporal.PlainDateTime | null {
    const transition = this.previousTransition(target);
    if (
      transition === null ||
      transition.shift <= 0 ||
      target - transition.at >= transition.shift
    ) {
      return null;
    }
    return this.wallClock(target).subtract({ milliseconds: transition.shift });
  }

  private horizonExceeded(
    direction: "before" | "after",
    timestamp: number,
  ): InvalidPatternError {
    const at = Temporal.Instant.fromEpochMilliseconds(timestamp).toString();
    return new InvalidPatternError(
      `pattern "${this.source}" has no occurrence within ${this.searchHorizonYears} years ${direction} ${at}`,
      this.source,
    );
  }
}
