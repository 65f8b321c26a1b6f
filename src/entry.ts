// Entry: a single parsed rule and its per-instant evaluation.

import { type CronPattern, MINUTE_MS } from "./pattern.js";
import type { ReservationNode } from "./types.js";

/** Reservation size meaning "every executor on the node". */
export const ALL = "all";

export type ReservationSize = number | typeof ALL;

export class Entry {
  readonly size: ReservationSize;
  readonly pattern: CronPattern;
  /** Window length in milliseconds. */
  readonly duration: number;

  constructor(size: ReservationSize, pattern: CronPattern, duration: number) {
    this.size = size;
    this.pattern = pattern;
    this.duration = duration;
    Object.freeze(this);
  }

  /** The number of slots this entry reserves on `node` while active. */
  reservationSize(node: ReservationNode): number {
    return this.size === ALL ? node.executorCount() : this.size;
  }

  /**
   * Slots reserved at `timestamp`: the full size inside
   * `[floor(timestamp), floor(timestamp) + duration)`, otherwise 0.
   */
  sizeOfReservation(node: ReservationNode, timestamp: number): number {
    const start = this.pattern.floor(timestamp);
    if (start <= timestamp && timestamp < start + this.duration) {
      return this.reservationSize(node);
    }
    return 0;
  }

  /** Earliest instant at which this entry's contribution may change. */
  timeOfNextChange(timestamp: number): number {
    const end = this.pattern.floor(timestamp) + this.duration;
    const start = this.pattern.ceil(timestamp);

    if (timestamp < end) return Math.min(end, start);
    return start;
  }

  /** Duration in whole minutes, as written in rule text. */
  get durationMinutes(): number {
    return this.duration / MINUTE_MS;
  }
}
