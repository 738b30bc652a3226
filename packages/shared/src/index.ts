export type { PlayerInput, Player, PlayerCounters } from './types/player.js';
export type { VenueKind, MatchTitleKind, MatchDescriptor } from './types/match.js';
export type {
  AllocationConfig,
  MatchAllocation,
  PlayerSummary,
  MatchSheet,
  AllocationWarning,
  AllocationWarningType,
  AllocationError,
  AllocationErrorType,
  AllocationLogEntry,
  AllocateRequest,
  AllocateResult,
} from './types/allocation.js';
export {
  DEFAULT_ALLOCATION_CONFIG,
  RESERVE_CHAIN_SIZE,
  LINE_SIZE,
  SUMMARY_COLUMNS,
  REFERENCE_COLUMNS,
} from './types/allocation.js';
export type {
  SheetCell,
  SheetTable,
  RosterImportError,
  RosterImportResult,
} from './types/roster-import.js';
export { ROSTER_COLUMNS, DEFAULT_ROSTER_SHEET } from './types/roster-import.js';
