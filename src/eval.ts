// Evaluator: floor/ceil searches over wall-clock fields for cron patterns.

import { Temporal } from "@js-temporal/polyfill";
import type { CronFields } from "./cron.js";

type PDT = Temporal.PlainDateTime;

// =============================================================================
// Search Strategy
// =============================================================================
// Both searches walk the calendar field by field, from the coarsest (month)
// to the finest (minute). When a field does not match, the cursor jumps to
// the first (ceil) or last (floor) minute of the next candidate unit instead
// of stepping minute by minute, so a search costs at most a handful of
// iterations per candidate day.
//
// The searches stop once the cursor leaves the year given as the limit and
// report null. Callers turn that into an error: a pattern with no occurrence
// in the horizon (e.g. February 31st) must never loop forever.
// =============================================================================

// --- Helpers ---

/** Smallest value in `values` that is >= `v`, or null. */
function nextValue(values: readonly number[], v: number): number | null {
  for (const x of values) {
    if (x >= v) return x;
  }
  return null;
}

/** Largest value in `values` that is <= `v`, or null. */
function prevValue(values: readonly number[], v: number): number | null {
  for (let i = values.length - 1; i >= 0; i--) {
    if (values[i] <= v) return values[i];
  }
  return null;
}

function cronDayOfWeek(dt: PDT): number {
  return dt.dayOfWeek % 7; // Temporal: 1=Monday ... 7=Sunday
}

function matchesDay(fields: CronFields, dt: PDT): boolean {
  return (
    fields.daysOfMonth.includes(dt.day) &&
    fields.daysOfWeek.includes(cronDayOfWeek(dt))
  );
}

function startOfNextDay(dt: PDT): PDT {
  const date = dt.toPlainDate().add({ days: 1 });
  return new Temporal.PlainDateTime(date.year, date.month, date.day);
}

function endOfPreviousDay(dt: PDT): PDT {
  const date = dt.toPlainDate().subtract({ days: 1 });
  return new Temporal.PlainDateTime(date.year, date.month, date.day, 23, 59);
}

function endOfMonth(year: number, month: number): PDT {
  const first = new Temporal.PlainDate(year, month, 1);
  return new Temporal.PlainDateTime(year, month, first.daysInMonth, 23, 59);
}

export function truncateWallClock(dt: PDT): PDT {
  return dt.with({ second: 0, millisecond: 0, microsecond: 0, nanosecond: 0 });
}

// --- Matching ---

/** Check if a wall-clock minute satisfies every field of the pattern. */
export function matchesFields(fields: CronFields, dt: PDT): boolean {
  return (
    fields.months.includes(dt.month) &&
    matchesDay(fields, dt) &&
    fields.hours.includes(dt.hour) &&
    fields.minutes.includes(dt.minute)
  );
}

// --- Ceil ---

/**
 * Earliest matching wall-clock minute at or after `from`, or null when none
 * exists on or before the end of `limitYear`.
 */
export function ceilFrom(
  fields: CronFields,
  from: PDT,
  limitYear: number,
): PDT | null {
  let dt = truncateWallClock(from);

  while (dt.year <= limitYear) {
    const month = nextValue(fields.months, dt.month);
    if (month === null) {
      dt = new Temporal.PlainDateTime(dt.year + 1, fields.months[0], 1);
      continue;
    }
    if (month !== dt.month) {
      dt = new Temporal.PlainDateTime(dt.year, month, 1);
      continue;
    }

    if (!matchesDay(fields, dt)) {
      dt = startOfNextDay(dt);
      continue;
    }

    const hour = nextValue(fields.hours, dt.hour);
    if (hour === null) {
      dt = startOfNextDay(dt);
      continue;
    }
    if (hour !== dt.hour) {
      dt = dt.with({ hour, minute: 0 });
      continue;
    }

    const minute = nextValue(fields.minutes, dt.minute);
    if (minute === null) {
      dt = dt.with({ minute: 0 }).add({ hours: 1 });
      continue;
    }
    return dt.with({ minute });
  }

  return null;
}

// --- Floor ---

/**
 * Latest matching wall-clock minute at or before `from`, or null when none
 * exists on or after the start of `limitYear`.
 */
export function floorFrom(
  fields: CronFields,
  from: PDT,
  limitYear: number,
): PDT | null {
  let dt = truncateWallClock(from);

  while (dt.year >= limitYear) {
    const month = prevValue(fields.months, dt.month);
    if (month === null) {
      dt = endOfMonth(dt.year - 1, fields.months[fields.months.length - 1]);
      continue;
    }
    if (month !== dt.month) {
      dt = endOfMonth(dt.year, month);
      continue;
    }

    if (!matchesDay(fields, dt)) {
      dt = endOfPreviousDay(dt);
      continue;
    }

    const hour = prevValue(fields.hours, dt.hour);
    if (hour === null) {
      dt = endOfPreviousDay(dt);
      continue;
    }
    if (hour !== dt.hour) {
      dt = dt.with({ hour, minute: 59 });
      continue;
    }

    const minute = prevValue(fields.minutes, dt.minute);
    if (minute === null) {
      dt = dt.with({ minute: 59 }).subtract({ hours: 1 });
      continue;
    }
    return dt.with({ minute });
  }

  return null;
}
