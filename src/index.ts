// slot-reservations: Public API

export { ALL, Entry } from "./entry.js";
export type { ReservationSize } from "./entry.js";
export {
  ConfigurationError,
  InvalidPatternError,
  MalformedRuleError,
  ReservationError,
} from "./error.js";
export type { ReservationErrorKind, Span } from "./error.js";
export { createDefaultLogger, createLogger, LOG_LEVELS } from "./logger.js";
export type { LoggerOptions, LogLevel, ReservationLogger } from "./logger.js";
export {
  PatternOptionsSchema,
  ScheduleOptionsSchema,
  resolvePatternOptions,
  resolveScheduleOptions,
} from "./options.js";
export type {
  PatternOptions,
  ResolvedPatternOptions,
  ResolvedScheduleOptions,
  ScheduleOptions,
} from "./options.js";
export { CronPattern, MINUTE_MS, truncateToMinute } from "./pattern.js";
export { NEVER, ReservationSchedule, validate } from "./schedule.js";
export type { SerializedSchedule, ValidationResult } from "./schedule.js";
export { timeline } from "./timeline.js";
export type { ReservationSegment, TimelineOptions } from "./timeline.js";
export type { ReservationNode, ReservationScheduler } from "./types.js";
