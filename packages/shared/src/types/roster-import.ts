/**
 * Roster sheet import types
 * The sign-up form export: one row per player, one column per match
 */

import type { PlayerInput } from './player.js';
import type { MatchDescriptor } from './match.js';

/**
 * Column titles the roster sheet uses
 */
export const ROSTER_COLUMNS = {
  playerNumber: 'Spelare',
  name: 'Barnets namn',
  goalkeeper: 'Målvakt',
  reserve: 'Reserv',
  awayResponses: '#Borta svar',
} as const;

export const DEFAULT_ROSTER_SHEET = 'Formulärsvar 1 (exakt)';

/**
 * A primitive cell value after reading a workbook
 */
export type SheetCell = string | number | boolean | null;

/**
 * A sheet as header titles plus rows keyed by title
 */
export interface SheetTable {
  headers: string[];
  rows: Array<Record<string, SheetCell>>;
}

/**
 * A validation error for an import row or column
 */
export interface RosterImportError {
  rowNumber?: number; // Sheet row number (header is row 1); absent for column-level problems
  field: string;
  message: string;
  value?: string;
}

export interface RosterImportResult {
  players: PlayerInput[];
  matches: MatchDescriptor[];
  matchColumns: string[];
  errors: RosterImportError[];
}
