import type { MatchAllocation, MatchSheet, PlayerSummary } from '@callup/shared';
import { LINE_SIZE } from '@callup/shared';
import type { Roster } from './roster.js';

/**
 * Two outfield lines are always shown, so the reserve chain is the third line
 */
const MIN_OUTFIELD_LINES = 2;

/**
 * Match sheet row labels
 */
export const MATCH_SHEET_LABELS = {
  goalkeeper: (gkCap: number) => `MÅLVAKT (max ${gkCap})`,
  line: (lineNumber: number) => `KEDJA ${lineNumber} (UTE)`,
  reserveLine: (lineNumber: number) => `KEDJA ${lineNumber} (RESERV)`,
  possibleReserves: 'MÖJLIGA RESERVER',
};

/**
 * Build one summary row per player, in roster order
 */
export function buildPlayerSummaries(
  roster: Roster,
  allocations: readonly MatchAllocation[]
): PlayerSummary[] {
  const homeMatches = new Map<string, number>();
  const awayMatches = new Map<string, number>();

  for (const allocation of allocations) {
    const played = allocation.venueKind === 'home' ? homeMatches : awayMatches;
    for (const id of [...allocation.selected, ...allocation.reserveChain]) {
      played.set(id, (played.get(id) || 0) + 1);
    }
  }

  return roster.getPlayers().map((player) => {
    const counters = roster.getCounters(player.id);
    return {
      playerId: player.id,
      name: player.name,
      homeCalls: counters.homeCalls,
      awayCalls: counters.awayCalls,
      totalCalls: counters.homeCalls + counters.awayCalls,
      reserveCalls: counters.reserveCalls,
      goalkeeperCalls: counters.goalkeeperCalls,
      homeMatches: homeMatches.get(player.id) || 0,
      awayMatches: awayMatches.get(player.id) || 0,
      awayWilling: player.awayWilling,
    };
  });
}

/**
 * Split outfield players into lines, padding with empty lines up to `minLines`
 */
export function splitIntoLines(
  playerNames: string[],
  lineSize: number = LINE_SIZE,
  minLines: number = MIN_OUTFIELD_LINES
): string[][] {
  const lines: string[][] = [];
  for (let i = 0; i < playerNames.length; i += lineSize) {
    lines.push(playerNames.slice(i, i + lineSize));
  }
  while (lines.length < minLines) {
    lines.push([]);
  }
  return lines;
}

/**
 * Render the rows of a match sheet. Every row has the same width.
 */
export function buildMatchSheet(
  allocation: MatchAllocation,
  nameOf: (playerId: string) => string,
  gkCap: number
): MatchSheet {
  const outfield = allocation.selected.filter((id) => id !== allocation.goalkeeper);
  const lines = splitIntoLines(outfield.map(nameOf));

  const rows: string[][] = [
    [MATCH_SHEET_LABELS.goalkeeper(gkCap), ...(allocation.goalkeeper ? [nameOf(allocation.goalkeeper)] : [])],
    ...lines.map((line, i) => [MATCH_SHEET_LABELS.line(i + 1), ...line]),
  ];
  if (allocation.reserveChain.length > 0) {
    rows.push([MATCH_SHEET_LABELS.reserveLine(lines.length + 1), ...allocation.reserveChain.map(nameOf)]);
  }
  rows.push([MATCH_SHEET_LABELS.possibleReserves, ...allocation.possibleReserves.map(nameOf)]);

  const width = Math.max(...rows.map((row) => row.length));
  return {
    matchId: allocation.matchId,
    title: allocation.title,
    rows: rows.map((row) => [...row, ...Array<string>(width - row.length).fill('')]),
  };
}

/**
 * Render every match sheet, resolving player ids to names through the roster
 */
export function buildMatchSheets(
  roster: Roster,
  allocations: readonly MatchAllocation[],
  gkCap: number
): MatchSheet[] {
  const nameOf = (id: string) => roster.getPlayer(id)?.name ?? id;
  return allocations.map((allocation) => buildMatchSheet(allocation, nameOf, gkCap));
}
