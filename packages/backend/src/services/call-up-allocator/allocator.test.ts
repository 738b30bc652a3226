import { describe, it, expect } from 'vitest';
import type { AllocationConfig, MatchDescriptor, PlayerInput, VenueKind } from '@callup/shared';
import { DEFAULT_ALLOCATION_CONFIG } from '@callup/shared';
import { Roster } from './roster.js';
import { CallUpAllocator } from './allocator.js';

// Helper to create players P1..Pn, nobody volunteering unless listed
function createPlayers(
  count: number,
  options: { goalkeepers?: string[]; willing?: string[] } = {}
): PlayerInput[] {
  return Array.from({ length: count }, (_, i) => {
    const id = `P${i + 1}`;
    return {
      id,
      name: id,
      willingGoalkeeper: options.goalkeepers?.includes(id) ?? false,
      willingMoreMatches: options.willing?.includes(id) ?? false,
    };
  });
}

// Helper to create a match where the given players said yes
function createMatch(
  id: string,
  venueKind: VenueKind,
  availablePlayerIds: string[],
  overrides: Partial<MatchDescriptor> = {}
): MatchDescriptor {
  return { id, title: id, venueKind, availablePlayerIds, ...overrides };
}

function allIds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `P${i + 1}`);
}

function runAllocator(
  players: PlayerInput[],
  matches: MatchDescriptor[],
  config: Partial<AllocationConfig> = {}
) {
  const roster = new Roster(players);
  const allocator = new CallUpAllocator(roster, matches, { ...DEFAULT_ALLOCATION_CONFIG, ...config });
  const allocations = allocator.allocate();
  return { roster, allocator, allocations };
}

describe('CallUpAllocator', () => {
  describe('single match', () => {
    it('picks a volunteer goalkeeper, fills slots and builds a reserve chain of four', () => {
      const { allocations, allocator, roster } = runAllocator(
        createPlayers(6, { goalkeepers: ['P1', 'P2'] }),
        [createMatch('M1', 'home', allIds(6))],
        { slotTarget: 2 }
      );

      expect(allocations).toEqual([
        {
          matchId: 'M1',
          title: 'M1',
          venueKind: 'home',
          goalkeeper: 'P1',
          selected: ['P1', 'P2'],
          shortfallReserves: [],
          reserveChain: ['P3', 'P4', 'P5', 'P6'],
          possibleReserves: [],
        },
      ]);
      expect(allocator.getWarnings()).toEqual([]);
      expect(roster.getCounters('P1')).toEqual({
        homeCalls: 1,
        awayCalls: 0,
        goalkeeperCalls: 1,
        reserveCalls: 0,
      });
      expect(roster.getCounters('P3').reserveCalls).toBe(1);
    });

    it('prefers a goalkeeper volunteer over roster order', () => {
      const { allocations } = runAllocator(
        createPlayers(4, { goalkeepers: ['P3'] }),
        [createMatch('M1', 'home', allIds(4))],
        { slotTarget: 3 }
      );

      expect(allocations[0].goalkeeper).toBe('P3');
      expect(allocations[0].selected).toEqual(['P3', 'P1', 'P2']);
      expect(allocations[0].possibleReserves).toEqual(['P4']);
    });

    it('picks the goalkeeper in roster order when volunteers are not preferred', () => {
      const { allocations } = runAllocator(
        createPlayers(4, { goalkeepers: ['P3'] }),
        [createMatch('M1', 'home', allIds(4))],
        { slotTarget: 3, preferGkVolunteers: false }
      );

      expect(allocations[0].goalkeeper).toBe('P1');
      expect(allocations[0].selected).toEqual(['P1', 'P2', 'P3']);
    });

    it('walks available players in roster order, not availability order', () => {
      const players: PlayerInput[] = [
        { id: 'A', name: 'A', order: 3, willingGoalkeeper: false, willingMoreMatches: false },
        { id: 'B', name: 'B', order: 1, willingGoalkeeper: false, willingMoreMatches: false },
        { id: 'C', name: 'C', order: 2, willingGoalkeeper: false, willingMoreMatches: false },
      ];
      const { allocations } = runAllocator(players, [createMatch('M1', 'away', ['A', 'C', 'B'])], {
        slotTarget: 2,
      });

      expect(allocations[0].goalkeeper).toBe('B');
      expect(allocations[0].selected).toEqual(['B', 'C']);
      expect(allocations[0].possibleReserves).toEqual(['A']);
    });

    it('skips the goalkeeper when the match does not need one', () => {
      const { allocations, allocator, roster } = runAllocator(
        createPlayers(3, { goalkeepers: ['P2'] }),
        [createMatch('M1', 'home', allIds(3), { needsGoalkeeper: false, slotTarget: 2 })]
      );

      expect(allocations[0].goalkeeper).toBeNull();
      expect(allocations[0].selected).toEqual(['P1', 'P2']);
      expect(roster.getCounters('P2').goalkeeperCalls).toBe(0);
      expect(allocator.getWarnings().map((w) => w.type)).toEqual(['reserve_chain_skipped']);
    });

    it('selects nobody for a zero slot target', () => {
      const { allocations, allocator } = runAllocator(
        createPlayers(4),
        [createMatch('M1', 'home', allIds(4), { slotTarget: 0 })]
      );

      expect(allocations[0].goalkeeper).toBeNull();
      expect(allocations[0].selected).toEqual([]);
      expect(allocations[0].reserveChain).toEqual(['P1', 'P2', 'P3', 'P4']);
      expect(allocator.getWarnings()).toEqual([]);
    });

    it('warns about unknown players and ignores them', () => {
      const { allocations, allocator } = runAllocator(
        createPlayers(2),
        [createMatch('M1', 'home', ['P1', 'ghost', 'P2'])],
        { slotTarget: 2 }
      );

      expect(allocations[0].selected).toEqual(['P1', 'P2']);
      expect(allocator.getWarnings()).toEqual([
        {
          type: 'unknown_player',
          matchId: 'M1',
          message: 'M1: "ghost" is not on the roster',
          details: { playerId: 'ghost' },
        },
      ]);
    });

    it('warns when no one is eligible to keep goal', () => {
      const { allocations, allocator } = runAllocator(
        createPlayers(3, { goalkeepers: ['P1'] }),
        [createMatch('M1', 'home', allIds(3))],
        { slotTarget: 2, gkCap: 0 }
      );

      expect(allocations[0].goalkeeper).toBeNull();
      expect(allocations[0].selected).toEqual(['P1', 'P2']);
      expect(allocator.getWarnings().map((w) => w.type)).toEqual([
        'no_eligible_goalkeeper',
        'reserve_chain_skipped',
      ]);
    });
  });

  describe('reserve chain', () => {
    it('takes the remaining players when fewer than four are left under the relaxed rule', () => {
      const { allocations, allocator } = runAllocator(
        createPlayers(5),
        [createMatch('M1', 'home', allIds(5))],
        { slotTarget: 2, requireExactReserveFour: false }
      );

      expect(allocations[0].reserveChain).toEqual(['P3', 'P4', 'P5']);
      expect(allocations[0].possibleReserves).toEqual([]);
      expect(allocator.getWarnings()).toEqual([]);
    });

    it('skips the chain when three are left under the exact-four rule', () => {
      const { allocations, allocator, roster } = runAllocator(
        createPlayers(5),
        [createMatch('M1', 'home', allIds(5))],
        { slotTarget: 2 }
      );

      expect(allocations[0].reserveChain).toEqual([]);
      expect(allocations[0].possibleReserves).toEqual(['P3', 'P4', 'P5']);
      expect(roster.getCounters('P3').reserveCalls).toBe(0);
      expect(allocator.getWarnings()).toEqual([
        {
          type: 'reserve_chain_skipped',
          matchId: 'M1',
          message: 'M1: 3 players left, reserve chain needs exactly 4',
          details: { remaining: 3 },
        },
      ]);
    });

    it('skips the chain when five are left under the exact-four rule', () => {
      const { allocations } = runAllocator(
        createPlayers(7),
        [createMatch('M1', 'home', allIds(7))],
        { slotTarget: 2 }
      );

      expect(allocations[0].reserveChain).toEqual([]);
      expect(allocations[0].possibleReserves).toEqual(['P3', 'P4', 'P5', 'P6', 'P7']);
    });

    it('takes the first four of five under the relaxed rule', () => {
      const { allocations } = runAllocator(
        createPlayers(7),
        [createMatch('M1', 'home', allIds(7))],
        { slotTarget: 2, requireExactReserveFour: false }
      );

      expect(allocations[0].reserveChain).toEqual(['P3', 'P4', 'P5', 'P6']);
      expect(allocations[0].possibleReserves).toEqual(['P7']);
    });
  });

  describe('caps across matches', () => {
    it('stops calling a player up once the away cap is reached', () => {
      const matches = [
        createMatch('M1', 'away', allIds(4)),
        createMatch('M2', 'away', allIds(4)),
        createMatch('M3', 'away', ['P1', 'P2', 'P3']),
      ].map((m) => ({ ...m, needsGoalkeeper: false, slotTarget: 2 }));

      const { allocations, allocator, roster } = runAllocator(createPlayers(4), matches);

      expect(allocations.map((a) => a.selected)).toEqual([
        ['P1', 'P2'],
        ['P1', 'P2'],
        ['P3'],
      ]);
      expect(allocations[2].possibleReserves).toEqual(['P1', 'P2']);
      expect(roster.getCounters('P1').awayCalls).toBe(2);
      expect(allocator.getWarnings().filter((w) => w.type === 'unfilled_slot')).toEqual([
        {
          type: 'unfilled_slot',
          matchId: 'M3',
          message: 'M3: filled 1 of 2 slots',
          details: { filled: 1, slotTarget: 2 },
        },
      ]);
    });

    it('keeps home and away caps separate', () => {
      const { allocations, roster } = runAllocator(
        createPlayers(2),
        [
          createMatch('H1', 'home', allIds(2)),
          createMatch('A1', 'away', allIds(2)),
        ].map((m) => ({ ...m, needsGoalkeeper: false, slotTarget: 1 })),
        { maxHomeBase: 1, maxAwayBase: 1 }
      );

      expect(allocations.map((a) => a.selected)).toEqual([['P1'], ['P1']]);
      expect(roster.getCounters('P1')).toEqual({
        homeCalls: 1,
        awayCalls: 1,
        goalkeeperCalls: 0,
        reserveCalls: 0,
      });
    });

    it('moves the goalkeeper role on once the goalkeeper cap is reached', () => {
      const { allocations } = runAllocator(
        createPlayers(4, { goalkeepers: ['P1'] }),
        [createMatch('M1', 'home', allIds(4)), createMatch('M2', 'home', allIds(4))],
        { slotTarget: 1 }
      );

      expect(allocations.map((a) => a.goalkeeper)).toEqual(['P1', 'P2']);
    });

    it('does not pick a goalkeeper who is at the venue cap', () => {
      const { allocations } = runAllocator(
        createPlayers(3, { goalkeepers: ['P1'] }),
        [createMatch('M1', 'home', allIds(3)), createMatch('M2', 'home', allIds(3))],
        { slotTarget: 1, gkCap: 2, maxHomeBase: 1 }
      );

      expect(allocations.map((a) => a.goalkeeper)).toEqual(['P1', 'P2']);
    });

    it('never exceeds a cap and keeps each match partition disjoint', () => {
      const players = createPlayers(10, {
        goalkeepers: ['P2', 'P5', 'P9'],
        willing: ['P1', 'P4', 'P7', 'P10'],
      });
      const matches = Array.from({ length: 8 }, (_, m) =>
        createMatch(
          `M${m + 1}`,
          m % 2 === 0 ? 'home' : 'away',
          allIds(10).filter((_, p) => ((m + 1) * (p + 1)) % 3 !== 0),
          { slotTarget: 5 }
        )
      );
      const config = { fillShortfallFromReserves: true };

      const { allocations, roster } = runAllocator(players, matches, config);

      for (const player of roster.getPlayers()) {
        const counters = roster.getCounters(player.id);
        expect(counters.homeCalls).toBeLessThanOrEqual(DEFAULT_ALLOCATION_CONFIG.maxHomeBase);
        expect(counters.awayCalls).toBeLessThanOrEqual(DEFAULT_ALLOCATION_CONFIG.maxAwayBase);
        expect(counters.goalkeeperCalls).toBeLessThanOrEqual(DEFAULT_ALLOCATION_CONFIG.gkCap);
      }
      for (const allocation of allocations) {
        const ids = [
          ...allocation.selected,
          ...allocation.reserveChain,
          ...allocation.possibleReserves,
        ];
        expect(new Set(ids).size).toBe(ids.length);
        expect(allocation.selected.length).toBeLessThanOrEqual(5);
        if (allocation.goalkeeper) {
          expect(allocation.selected[0]).toBe(allocation.goalkeeper);
        }
      }
    });
  });

  describe('shortfall top-up', () => {
    it('tops up a short match with reserve volunteers as reserve calls', () => {
      const matches = [
        createMatch('M1', 'home', allIds(3)),
        createMatch('M2', 'home', allIds(3)),
      ].map((m) => ({ ...m, needsGoalkeeper: false, slotTarget: 2 }));

      const { allocations, allocator, roster } = runAllocator(
        createPlayers(3, { willing: ['P1', 'P3'] }),
        matches,
        { maxHomeBase: 1, fillShortfallFromReserves: true }
      );

      expect(allocations[1].selected).toEqual(['P3', 'P1']);
      expect(allocations[1].shortfallReserves).toEqual(['P1']);
      expect(allocations[1].possibleReserves).toEqual(['P2']);
      expect(roster.getCounters('P1')).toEqual({
        homeCalls: 1,
        awayCalls: 0,
        goalkeeperCalls: 0,
        reserveCalls: 1,
      });
      expect(allocator.getWarnings().some((w) => w.type === 'unfilled_slot')).toBe(false);
    });

    it('leaves a short match short when the top-up is off', () => {
      const matches = [
        createMatch('M1', 'home', allIds(3)),
        createMatch('M2', 'home', allIds(3)),
      ].map((m) => ({ ...m, needsGoalkeeper: false, slotTarget: 2 }));

      const { allocations } = runAllocator(createPlayers(3, { willing: ['P1', 'P3'] }), matches, {
        maxHomeBase: 1,
      });

      expect(allocations[1].selected).toEqual(['P3']);
      expect(allocations[1].shortfallReserves).toEqual([]);
    });
  });

  describe('repeated runs', () => {
    it('returns the first result without counting call-ups again', () => {
      const { allocations, allocator, roster } = runAllocator(
        createPlayers(6, { goalkeepers: ['P1'] }),
        [createMatch('M1', 'home', allIds(6))],
        { slotTarget: 2 }
      );
      const logLength = allocator.getAllocationLog().length;

      const again = allocator.allocate();

      expect(again).toHaveLength(1);
      expect(again).toEqual(allocations);
      expect(roster.getCounters('P1')).toEqual({
        homeCalls: 1,
        awayCalls: 0,
        goalkeeperCalls: 1,
        reserveCalls: 0,
      });
      expect(roster.getCounters('P3').reserveCalls).toBe(1);
      expect(allocator.getAllocationLog()).toHaveLength(logLength);
    });
  });

  describe('allocation log', () => {
    it('records start and finish entries', () => {
      const { allocator } = runAllocator(createPlayers(1), [createMatch('M1', 'home', ['P1'])]);
      const log = allocator.getAllocationLog();

      expect(log[0].message).toBe('Allocating 1 matches for 1 players');
      expect(log[log.length - 1].message).toBe('Allocation finished with 1 warnings');
    });
  });
});
