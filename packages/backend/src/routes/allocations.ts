import { Hono } from 'hono';
import type {
  AllocateRequest,
  AllocationConfig,
  MatchDescriptor,
  PlayerInput,
} from '@callup/shared';
import { DEFAULT_ROSTER_SHEET } from '@callup/shared';
import { runAllocation, parseConfigOverrides } from '../services/call-up-allocator/index.js';
import {
  allocateWorkbook,
  formatImportError,
  type WorkbookAllocationOutcome,
} from '../services/workbook-allocation.js';
import { loadWorkbook } from '../services/workbook.js';

const router = new Hono();

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === 'number';
}

function optionalCount(value: unknown): value is number | undefined {
  return value === undefined || (typeof value === 'number' && Number.isInteger(value) && value >= 0);
}

function optionalBoolean(value: unknown): value is boolean | undefined {
  return value === undefined || typeof value === 'boolean';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parsePlayer(value: unknown, index: number): PlayerInput | string {
  if (!isRecord(value)) return `players[${index}] must be an object`;
  const { id, name, order, willingMoreMatches, willingGoalkeeper, awayResponseCount } = value;
  if (typeof id !== 'string' || id === '') return `players[${index}].id is required`;
  if (name !== undefined && typeof name !== 'string') return `players[${index}].name must be a string`;
  if (typeof willingMoreMatches !== 'boolean') return `players[${index}].willingMoreMatches must be a boolean`;
  if (typeof willingGoalkeeper !== 'boolean') return `players[${index}].willingGoalkeeper must be a boolean`;
  if (!optionalNumber(order)) return `players[${index}].order must be a number`;
  if (!optionalNumber(awayResponseCount)) return `players[${index}].awayResponseCount must be a number`;
  return { id, name: name ?? id, order, willingMoreMatches, willingGoalkeeper, awayResponseCount };
}

function parseMatch(value: unknown, index: number): MatchDescriptor | string {
  if (!isRecord(value)) return `matches[${index}] must be an object`;
  const { id, title, venueKind, availablePlayerIds, needsGoalkeeper, slotTarget } = value;
  if (typeof id !== 'string' || id === '') return `matches[${index}].id is required`;
  if (title !== undefined && typeof title !== 'string') return `matches[${index}].title must be a string`;
  if (venueKind !== 'home' && venueKind !== 'away') return `matches[${index}].venueKind must be "home" or "away"`;
  if (!isStringArray(availablePlayerIds)) {
    return `matches[${index}].availablePlayerIds must be an array of strings`;
  }
  if (!optionalBoolean(needsGoalkeeper)) return `matches[${index}].needsGoalkeeper must be a boolean`;
  if (!optionalCount(slotTarget)) return `matches[${index}].slotTarget must be a non-negative integer`;
  return { id, title: title ?? id, venueKind, availablePlayerIds, needsGoalkeeper, slotTarget };
}

function parseConfig(value: unknown): Partial<AllocationConfig> | string {
  if (value === undefined) return {};
  if (!isRecord(value)) return 'config must be an object';
  const config: Partial<AllocationConfig> = {};
  for (const key of ['gkCap', 'maxHomeBase', 'maxAwayBase', 'slotTarget'] as const) {
    const option = value[key];
    if (!optionalNumber(option)) return `config.${key} must be a number`;
    if (option !== undefined) config[key] = option;
  }
  for (const key of ['requireExactReserveFour', 'preferGkVolunteers', 'fillShortfallFromReserves'] as const) {
    const option = value[key];
    if (!optionalBoolean(option)) return `config.${key} must be a boolean`;
    if (option !== undefined) config[key] = option;
  }
  return config;
}

/**
 * Check the shape of a JSON allocation request
 */
export function parseAllocateRequest(body: unknown): AllocateRequest | string {
  if (!isRecord(body)) return 'Request body must be a JSON object';
  if (!Array.isArray(body.players)) return 'players is required and must be an array';
  if (!Array.isArray(body.matches)) return 'matches is required and must be an array';

  const rawPlayers: unknown[] = body.players;
  const rawMatches: unknown[] = body.matches;

  const players: PlayerInput[] = [];
  for (const [index, raw] of rawPlayers.entries()) {
    const player = parsePlayer(raw, index);
    if (typeof player === 'string') return player;
    players.push(player);
  }

  const matches: MatchDescriptor[] = [];
  for (const [index, raw] of rawMatches.entries()) {
    const match = parseMatch(raw, index);
    if (typeof match === 'string') return match;
    matches.push(match);
  }

  const config = parseConfig(body.config);
  if (typeof config === 'string') return config;

  return { players, matches, config };
}

// POST /api/allocations - Allocate a roster across matches
router.post('/', async (c) => {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: 'Request body must be valid JSON' }, 400);
  }

  const request = parseAllocateRequest(body);
  if (typeof request === 'string') {
    return c.json({ error: request }, 400);
  }

  const result = runAllocation(request);
  if (!result.success) {
    const status = result.errors?.some((e) => e.type === 'allocation_failed') ? 500 : 400;
    return c.json(result, status);
  }
  return c.json(result);
});

/**
 * POST /api/allocations/workbook
 * Allocate a sign-up workbook and return the annotated workbook
 *
 * Body: the .xlsx file
 * Query params:
 * - sheet (optional): roster sheet name
 * - gkCap, maxHomeBase, maxAwayBase, slotTarget, requireExactReserveFour,
 *   preferGkVolunteers, fillShortfallFromReserves (optional): allocation options
 */
router.post('/workbook', async (c) => {
  const sheetName = c.req.query('sheet') || DEFAULT_ROSTER_SHEET;
  const data = await c.req.arrayBuffer();
  if (data.byteLength === 0) {
    return c.json({ error: 'Request body must be an .xlsx workbook' }, 400);
  }

  let outcome: WorkbookAllocationOutcome;
  try {
    const workbook = await loadWorkbook(data);
    outcome = allocateWorkbook(workbook, sheetName, parseConfigOverrides(c.req.query()));
  } catch (error) {
    console.error('Workbook read error:', error);
    return c.json(
      { error: error instanceof Error ? error.message : 'Could not read workbook' },
      400
    );
  }

  if (!outcome.ok) {
    if (outcome.stage === 'import') {
      return c.json({ error: 'Invalid roster sheet', details: outcome.importErrors.map(formatImportError) }, 400);
    }
    return c.json(outcome.result, 400);
  }

  try {
    const buffer = await outcome.output.xlsx.writeBuffer();
    return new Response(buffer, {
      status: 200,
      headers: {
        'Content-Type': XLSX_CONTENT_TYPE,
        'Content-Disposition': 'attachment; filename="allocation.xlsx"',
      },
    });
  } catch (error) {
    console.error('Workbook write error:', error);
    return c.json({ error: 'Failed to write workbook' }, 500);
  }
});

export default router;
