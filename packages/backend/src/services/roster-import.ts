import type {
  MatchDescriptor,
  MatchTitleKind,
  PlayerInput,
  RosterImportError,
  RosterImportResult,
  SheetCell,
  SheetTable,
} from '@callup/shared';
import { ROSTER_COLUMNS } from '@callup/shared';

const YES_VALUES = new Set(['ja', 'j', 'yes', 'y', '1', 'true']);

/**
 * Interpret a form answer as yes/no
 */
export function parseYesNo(value: SheetCell | undefined): boolean {
  if (value === null || value === undefined) return false;
  return YES_VALUES.has(String(value).trim().toLowerCase());
}

/**
 * Classify a column title as a home match, an away match, or not a match.
 * Match titles carry the venue in parentheses, e.g. "12/10 Team X (Hemma)".
 */
export function classifyMatchTitle(title: string): MatchTitleKind {
  if (!title.includes('(') || !title.includes(')')) {
    return 'unknown';
  }
  if (title.includes('Hemma')) return 'home';
  if (title.includes('Borta')) return 'away';
  return 'unknown';
}

/**
 * Get the match columns of a sheet, in sheet order
 */
export function findMatchColumns(headers: string[]): string[] {
  return headers.filter((h) => classifyMatchTitle(h) !== 'unknown');
}

function cellToString(value: SheetCell | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Read a count cell. Blank cells count as zero.
 */
function cellToCount(value: SheetCell | undefined): number {
  if (value === null || value === undefined || value === '') return 0;
  const n = typeof value === 'number' ? value : Number(String(value).trim());
  return Number.isFinite(n) ? n : 0;
}

/**
 * Turn the sign-up sheet into roster rows and match descriptors.
 * Problems are collected rather than thrown; callers must not allocate
 * when `errors` is non-empty.
 */
export function importRosterSheet(table: SheetTable): RosterImportResult {
  const errors: RosterImportError[] = [];
  const headers = table.headers;

  for (const required of [ROSTER_COLUMNS.goalkeeper, ROSTER_COLUMNS.reserve]) {
    if (!headers.includes(required)) {
      errors.push({ field: required, message: `Missing required column "${required}"` });
    }
  }

  const matchColumns = findMatchColumns(headers);
  if (matchColumns.length === 0) {
    errors.push({
      field: 'matches',
      message: 'No match columns found. Match titles must contain "(Hemma)" or "(Borta)"',
    });
  }

  if (errors.length > 0) {
    return { players: [], matches: [], matchColumns, errors };
  }

  const awayColumns = matchColumns.filter((c) => classifyMatchTitle(c) === 'away');
  const hasAwayCountColumn = headers.includes(ROSTER_COLUMNS.awayResponses);
  const hasPlayerNumbers = headers.includes(ROSTER_COLUMNS.playerNumber);

  const players: PlayerInput[] = [];
  const playerIdsByRow: string[] = [];
  const seenIds = new Map<string, number>();

  table.rows.forEach((row, index) => {
    const rowNumber = index + 2;
    let order = index + 1;

    if (hasPlayerNumbers) {
      const raw = cellToString(row[ROSTER_COLUMNS.playerNumber]);
      const parsed = Number(raw);
      if (raw === '' || !Number.isInteger(parsed)) {
        errors.push({
          rowNumber,
          field: ROSTER_COLUMNS.playerNumber,
          message: 'Player number must be a whole number',
          value: raw,
        });
      } else {
        order = parsed;
      }
    }

    const name = cellToString(row[ROSTER_COLUMNS.name]) || String(order);
    const firstRow = seenIds.get(name);
    if (firstRow !== undefined) {
      errors.push({
        rowNumber,
        field: ROSTER_COLUMNS.name,
        message: `Duplicate player (first seen on row ${firstRow})`,
        value: name,
      });
    }
    seenIds.set(name, rowNumber);

    let awayResponseCount: number | undefined;
    if (hasAwayCountColumn) {
      awayResponseCount = cellToCount(row[ROSTER_COLUMNS.awayResponses]);
    } else if (awayColumns.length > 0) {
      awayResponseCount = awayColumns.filter((c) => parseYesNo(row[c])).length;
    }

    playerIdsByRow.push(name);
    players.push({
      id: name,
      name,
      order,
      willingGoalkeeper: parseYesNo(row[ROSTER_COLUMNS.goalkeeper]),
      willingMoreMatches: parseYesNo(row[ROSTER_COLUMNS.reserve]),
      awayResponseCount,
    });
  });

  if (errors.length > 0) {
    return { players: [], matches: [], matchColumns, errors };
  }

  const matches: MatchDescriptor[] = matchColumns.map((column) => ({
    id: column,
    title: column,
    venueKind: classifyMatchTitle(column) === 'home' ? 'home' : 'away',
    availablePlayerIds: table.rows
      .map((row, index) => (parseYesNo(row[column]) ? playerIdsByRow[index] : undefined))
      .filter((id): id is string => id !== undefined),
  }));

  return { players, matches, matchColumns, errors };
}
