// Options: zod schemas for pattern and schedule settings.

import { Temporal } from "@js-temporal/polyfill";
import { ZodError, z } from "zod";
import { ConfigurationError } from "./error.js";
import {
  createDefaultLogger,
  LOG_LEVELS,
  type ReservationLogger,
} from "./logger.js";

function isTimeZone(name: string): boolean {
  try {
    Temporal.Instant.fromEpochMilliseconds(0).toZonedDateTimeISO(name);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// Schemas
// =============================================================================

export const PatternOptionsSchema = z.object({
  /** IANA zone the pattern's wall-clock fields are read in (default: "UTC") */
  timeZone: z
    .string()
    .refine(isTimeZone, { message: "unknown time zone" })
    .default("UTC"),
  /** How many calendar years a floor/ceil search may scan (default: 30) */
  searchHorizonYears: z.number().int().positive().max(400).default(30),
});

export const ScheduleOptionsSchema = PatternOptionsSchema.extend({
  logLevel: z.enum(LOG_LEVELS).default("standard"),
});

// =============================================================================
// Types
// =============================================================================

export type PatternOptions = z.input<typeof PatternOptionsSchema>;
export type ResolvedPatternOptions = z.output<typeof PatternOptionsSchema>;

/**
 * Options accepted by `ReservationSchedule.parse`. An injected `logger`
 * takes precedence over `logLevel`.
 */
export type ScheduleOptions = z.input<typeof ScheduleOptionsSchema> & {
  logger?: ReservationLogger;
};

export type ResolvedScheduleOptions = z.output<typeof ScheduleOptionsSchema> & {
  logger: ReservationLogger;
};

// =============================================================================
// Resolution
// =============================================================================

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

export function resolvePatternOptions(
  options: PatternOptions = {},
): ResolvedPatternOptions {
  try {
    return PatternOptionsSchema.parse(options);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        `Pattern options validation failed:\n${describeIssues(error)}`,
      );
    }
    throw error;
  }
}

export function resolveScheduleOptions(
  options: ScheduleOptions = {},
): ResolvedScheduleOptions {
  const { logger, ...rest } = options;
  try {
    const parsed = ScheduleOptionsSchema.parse(rest);
    return { ...parsed, logger: logger ?? createDefaultLogger(parsed.logLevel) };
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        `Schedule options validation failed:\n${describeIssues(error)}`,
      );
    }
    throw error;
  }
}
