// Cron parsing: 5-field patterns (and @ macros) into per-field value lists.

import { InvalidPatternError } from "./error.js";

/** Allowed values for each cron field, sorted ascending and never empty. */
export interface CronFields {
  minutes: readonly number[];
  hours: readonly number[];
  daysOfMonth: readonly number[];
  months: readonly number[];
  /** 0 = Sunday ... 6 = Saturday. */
  daysOfWeek: readonly number[];
}

type FieldName = "minute" | "hour" | "day-of-month" | "month" | "day-of-week";

interface FieldSpec {
  name: FieldName;
  min: number;
  max: number;
  names?: Record<string, number>;
  /** Whether `?` is accepted as a synonym for `*`. */
  allowsAny?: boolean;
}

const MONTH_NAMES: Record<string, number> = {
  JAN: 1,
  FEB: 2,
  MAR: 3,
  APR: 4,
  MAY: 5,
  JUN: 6,
  JUL: 7,
  AUG: 8,
  SEP: 9,
  OCT: 10,
  NOV: 11,
  DEC: 12,
};

const DOW_NAMES: Record<string, number> = {
  SUN: 0,
  MON: 1,
  TUE: 2,
  WED: 3,
  THU: 4,
  FRI: 5,
  SAT: 6,
};

const FIELD_SPECS: readonly FieldSpec[] = [
  { name: "minute", min: 0, max: 59 },
  { name: "hour", min: 0, max: 23 },
  { name: "day-of-month", min: 1, max: 31, allowsAny: true },
  { name: "month", min: 1, max: 12, names: MONTH_NAMES },
  // 7 is accepted as Sunday and folded into 0 after expansion
  { name: "day-of-week", min: 0, max: 7, names: DOW_NAMES, allowsAny: true },
];

const MACROS: Record<string, string> = {
  "@yearly": "0 0 1 1 *",
  "@annually": "0 0 1 1 *",
  "@monthly": "0 0 1 * *",
  "@weekly": "0 0 * * 0",
  "@daily": "0 0 * * *",
  "@midnight": "0 0 * * *",
  "@hourly": "0 * * * *",
};

/** Parse a 5-field cron pattern or @ macro into its field value lists. */
export function parseCron(pattern: string): CronFields {
  const trimmed = pattern.trim();

  if (trimmed.startsWith("@")) {
    const expansion = MACROS[trimmed.toLowerCase()];
    if (expansion === undefined) {
      throw new InvalidPatternError(
        `unknown @ macro: ${trimmed}`,
        pattern,
        trimmed,
      );
    }
    return parseFields(expansion, pattern);
  }

  return parseFields(trimmed, pattern);
}

function parseFields(expr: string, source: string): CronFields {
  const parts = expr === "" ? [] : expr.split(/\s+/);
  if (parts.length !== FIELD_SPECS.length) {
    throw new InvalidPatternError(
      `expected 5 cron fields, got ${parts.length}`,
      source,
    );
  }

  const [minutes, hours, daysOfMonth, months, daysOfWeek] = parts.map(
    (part, i) => parseField(part, FIELD_SPECS[i], source),
  );

  return {
    minutes,
    hours,
    daysOfMonth,
    months,
    daysOfWeek: normalize(daysOfWeek.map((d) => (d === 7 ? 0 : d))),
  };
}

/** Expand one field (`*`, values, ranges, steps and comma lists). */
function parseField(text: string, spec: FieldSpec, source: string): number[] {
  const fail = (reason: string): InvalidPatternError =>
    new InvalidPatternError(
      `invalid ${spec.name} field "${text}": ${reason}`,
      source,
      text,
    );

  const values: number[] = [];

  for (const part of text.split(",")) {
    if (part === "") {
      throw fail("empty list element");
    }

    const pieces = part.split("/");
    if (pieces.length > 2) {
      throw fail(`too many steps in ${part}`);
    }
    const [rangePart, stepStr] = pieces;

    let start: number;
    let end: number;
    if (rangePart === "*" || (rangePart === "?" && spec.allowsAny)) {
      start = spec.min;
      end = spec.max;
    } else if (rangePart.includes("-")) {
      const bounds = rangePart.split("-");
      if (bounds.length !== 2) {
        throw fail(`invalid range ${rangePart}`);
      }
      start = parseValue(bounds[0], spec, fail);
      end = parseValue(bounds[1], spec, fail);
      if (start > end) {
        throw fail(`range start must be <= end: ${rangePart}`);
      }
    } else {
      start = parseValue(rangePart, spec, fail);
      // A bare value with a step runs to the end of the field
      end = stepStr === undefined ? start : spec.max;
    }

    let step = 1;
    if (stepStr !== undefined) {
      if (!/^\d+$/.test(stepStr)) {
        throw fail(`invalid step value: ${stepStr}`);
      }
      step = Number(stepStr);
      if (step === 0) {
        throw fail("step cannot be 0");
      }
    }

    for (let v = start; v <= end; v += step) {
      values.push(v);
    }
  }

  return normalize(values);
}

/** Parse a single numeric value or name with range validation. */
function parseValue(
  s: string,
  spec: FieldSpec,
  fail: (reason: string) => InvalidPatternError,
): number {
  if (/^\d+$/.test(s)) {
    const value = Number(s);
    if (value < spec.min || value > spec.max) {
      throw fail(`${spec.name} must be ${spec.min}-${spec.max}, got ${value}`);
    }
    return value;
  }

  const named = spec.names?.[s.toUpperCase()];
  if (named === undefined) {
    throw fail(`invalid ${spec.name} value: ${s === "" ? "(empty)" : s}`);
  }
  return named;
}

function normalize(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}
