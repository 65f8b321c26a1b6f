// Timeline: walks a scheduler's change points to describe a time range.

import { ConfigurationError } from "./error.js";
import { MINUTE_MS } from "./pattern.js";
import type { ReservationNode, ReservationScheduler } from "./types.js";

/** A maximal span `[start, end)` during which the reserved size is constant. */
export interface ReservationSegment {
  start: number;
  end: number;
  size: number;
}

export interface TimelineOptions {
  /**
   * Minimum cursor advance when the scheduler reports a next change that is
   * not after the cursor (default: one minute).
   */
  minStepMs?: number;
}

/**
 * Returns a lazy iterator of segments covering `[from, to)`. Adjacent spans
 * with the same size are merged into one segment.
 */
export function* timeline(
  scheduler: ReservationScheduler,
  node: ReservationNode,
  from: number,
  to: number,
  options: TimelineOptions = {},
): Generator<ReservationSegment, void, unknown> {
  const minStep = options.minStepMs ?? MINUTE_MS;
  if (!(minStep > 0)) {
    throw new ConfigurationError(`minStepMs must be positive, got ${minStep}`);
  }

  let pending: ReservationSegment | null = null;
  let cursor = from;

  while (cursor < to) {
    const size = scheduler.sizeOfReservation(node, cursor);
    let next = scheduler.timeOfNextChange(node, cursor);
    if (next <= cursor) {
      next = cursor + minStep;
    }
    const end = Math.min(next, to);

    if (pending !== null && pending.size === size) {
      const merged: ReservationSegment = { ...pending, end };
      pending = merged;
    } else {
      if (pending !== null) yield pending;
      pending = { start: cursor, end, size };
    }
    cursor = end;
  }

  if (pending !== null) yield pending;
}
