// Host-facing interfaces: what a schedule needs from a node, and what a host
// needs from a schedule.

/** A compute node whose executor slots can be reserved. */
export interface ReservationNode {
  /** Total executor slots on the node right now. Never negative. */
  executorCount(): number;
}

/**
 * Anything that can tell a host how many slots of a node are reserved and
 * when that answer may change. Hosts register implementations of this.
 */
export interface ReservationScheduler {
  /** Number of the node's slots reserved at `timestamp` (epoch ms). */
  sizeOfReservation(node: ReservationNode, timestamp: number): number;

  /**
   * Earliest instant (epoch ms) at which `sizeOfReservation` may differ from
   * its value at `timestamp`. May equal `timestamp`; callers re-querying in a
   * loop must advance by their own minimum step.
   */
  timeOfNextChange(node: ReservationNode, timestamp: number): number;
}
