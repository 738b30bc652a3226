/**
 * Player types
 * A player is one roster row: static willingness answers plus the
 * running call-up counters the allocator maintains for one run
 */

/**
 * A roster row as handed to the allocator
 */
export interface PlayerInput {
  id: string; // Unique row key (the player's name unless the roster has a separate key)
  name: string;
  order?: number; // Stable roster position; defaults to the row's position in the input
  willingMoreMatches: boolean; // "Reserv" answer
  willingGoalkeeper: boolean; // "Målvakt" answer
  awayResponseCount?: number; // "Yes" answers to away matches, when the roster has them
}

/**
 * A player after roster construction
 */
export interface Player {
  id: string;
  name: string;
  order: number;
  willingMoreMatches: boolean;
  willingGoalkeeper: boolean;
  awayResponseCount?: number;
  awayWilling: boolean; // Derived, see Roster.deriveAwayWillingness
}

/**
 * Running call-up counters for a player. Only ever incremented.
 */
export interface PlayerCounters {
  homeCalls: number;
  awayCalls: number;
  goalkeeperCalls: number;
  reserveCalls: number;
}
