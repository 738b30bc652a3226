import type { VenueKind, MatchDescriptor } from './match.js';
import type { PlayerInput } from './player.js';

/**
 * Options that drive a single allocation run
 */
export interface AllocationConfig {
  gkCap: number; // Max goalkeeper assignments per player
  maxHomeBase: number; // Max home call-ups per player
  maxAwayBase: number; // Max away call-ups per player
  requireExactReserveFour: boolean; // Reserve chain only when exactly four players remain
  preferGkVolunteers: boolean; // Pick goalkeeper volunteers before anyone else
  slotTarget: number; // Default call-ups per match, goalkeeper included
  fillShortfallFromReserves: boolean; // Top up short matches with reserve volunteers
}

export const DEFAULT_ALLOCATION_CONFIG: AllocationConfig = {
  gkCap: 1,
  maxHomeBase: 2,
  maxAwayBase: 2,
  requireExactReserveFour: true,
  preferGkVolunteers: true,
  slotTarget: 9,
  fillShortfallFromReserves: false,
};

/**
 * Size of the reserve chain (the third line)
 */
export const RESERVE_CHAIN_SIZE = 4;

/**
 * Players per outfield line on the match sheet
 */
export const LINE_SIZE = 4;

/**
 * What the allocator decided for one match
 */
export interface MatchAllocation {
  matchId: string;
  title: string;
  venueKind: VenueKind;
  goalkeeper: string | null;
  selected: string[]; // Goalkeeper first, then the other call-ups in roster order
  shortfallReserves: string[]; // Members of `selected` that were topped up from reserve volunteers
  reserveChain: string[];
  possibleReserves: string[]; // Informational only
}

/**
 * Per-player summary row
 */
export interface PlayerSummary {
  playerId: string;
  name: string;
  homeCalls: number;
  awayCalls: number;
  totalCalls: number;
  reserveCalls: number;
  goalkeeperCalls: number;
  homeMatches: number; // Home matches played, reserve chain included
  awayMatches: number; // Away matches played, reserve chain included
  awayWilling: boolean;
}

/**
 * Column titles of the summary block on the main sheet
 */
export const SUMMARY_COLUMNS = {
  homeCalls: 'Kallelser Hemma',
  awayCalls: 'Kallelser Borta',
  totalCalls: 'Kallelser Totalt',
  reserveCalls: 'Reservkallelser',
  goalkeeperCalls: 'Målvaktsgånger',
} as const;

export const REFERENCE_COLUMNS = {
  homeMatches: 'Antal Hemma matcher',
  awayMatches: 'Antal Borta matcher',
} as const;

/**
 * Rendered rows of a per-match sheet. The first cell of each row is its label.
 */
export interface MatchSheet {
  matchId: string;
  title: string;
  rows: string[][];
}

/**
 * Non-fatal issue found while allocating a match
 */
export interface AllocationWarning {
  type: AllocationWarningType;
  matchId: string;
  message: string;
  details?: Record<string, string | number>;
}

export type AllocationWarningType =
  | 'unfilled_slot'
  | 'no_eligible_goalkeeper'
  | 'reserve_chain_skipped'
  | 'unknown_player';

/**
 * Input problem that stops a run before allocation starts
 */
export interface AllocationError {
  type: AllocationErrorType;
  message: string;
  details?: Record<string, string | number>;
}

export type AllocationErrorType =
  | 'invalid_config'
  | 'invalid_roster'
  | 'no_matches'
  | 'allocation_failed';

/**
 * Log entry for auditing allocation decisions
 */
export interface AllocationLogEntry {
  timestamp: string;
  level: 'info' | 'warning' | 'error' | 'debug';
  category: 'goalkeeper' | 'slots' | 'reserve' | 'roster' | 'general';
  message: string;
  details?: {
    matchId?: string;
    playerId?: string;
    venueKind?: VenueKind;
    reason?: string;
    [key: string]: string | number | boolean | undefined;
  };
}

/**
 * Request to allocate a roster across a list of matches
 */
export interface AllocateRequest {
  players: PlayerInput[];
  matches: MatchDescriptor[];
  config?: Partial<AllocationConfig>;
}

/**
 * Result of an allocation run
 */
export interface AllocateResult {
  success: boolean;
  message: string;
  config: AllocationConfig;
  allocations: MatchAllocation[];
  summaries: PlayerSummary[];
  matchSheets: MatchSheet[];
  errors?: AllocationError[];
  warnings?: AllocationWarning[];
  allocationLog?: AllocationLogEntry[];
}
