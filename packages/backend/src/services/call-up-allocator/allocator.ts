import type {
  AllocationConfig,
  AllocationLogEntry,
  AllocationWarning,
  MatchAllocation,
  MatchDescriptor,
  Player,
} from '@callup/shared';
import { RESERVE_CHAIN_SIZE } from '@callup/shared';
import type { Roster } from './roster.js';
import {
  hasVenueCapacity,
  incrementVenueCalls,
  isGoalkeeperEligible,
  pickGoalkeeper,
  resolveAvailablePlayers,
} from './constraints.js';

export interface AllocatorOptions {
  verbose?: boolean; // Echo log entries to the console
}

/**
 * Greedy call-up allocator
 * Walks the matches in input order and, for each one, picks a goalkeeper,
 * fills the remaining slots in roster order under the per-player caps and
 * builds the reserve chain. Counters carry over from match to match, so the
 * order of the matches matters.
 *
 * Never throws for a short match: missing players become warnings.
 */
export class CallUpAllocator {
  private roster: Roster;
  private matches: MatchDescriptor[];
  private config: AllocationConfig;
  private verbose: boolean;

  private allocated = false;
  private allocations: MatchAllocation[] = [];
  private warnings: AllocationWarning[] = [];
  private allocationLog: AllocationLogEntry[] = [];

  constructor(
    roster: Roster,
    matches: MatchDescriptor[],
    config: AllocationConfig,
    options: AllocatorOptions = {}
  ) {
    this.roster = roster;
    this.matches = matches;
    this.config = config;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Add an entry to the allocation log
   */
  private log(
    level: AllocationLogEntry['level'],
    category: AllocationLogEntry['category'],
    message: string,
    details?: AllocationLogEntry['details']
  ): void {
    this.allocationLog.push({
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details,
    });
    if (this.verbose) {
      const detailsStr = details ? ` ${JSON.stringify(details)}` : '';
      console.log(`[${level.toUpperCase()}] [${category}] ${message}${detailsStr}`);
    }
  }

  private warn(warning: AllocationWarning, category: AllocationLogEntry['category']): void {
    this.warnings.push(warning);
    this.log('warning', category, warning.message, { matchId: warning.matchId, reason: warning.type });
  }

  /**
   * Allocate every match in order.
   * Runs once: the roster counters already hold the first run, so later
   * calls return its allocations unchanged.
   */
  allocate(): MatchAllocation[] {
    if (this.allocated) {
      return this.allocations;
    }
    this.allocated = true;

    this.roster.deriveAwayWillingness();
    this.log('info', 'general', `Allocating ${this.matches.length} matches for ${this.roster.size} players`, {
      gkCap: this.config.gkCap,
      maxHomeBase: this.config.maxHomeBase,
      maxAwayBase: this.config.maxAwayBase,
      slotTarget: this.config.slotTarget,
    });

    for (const match of this.matches) {
      this.allocations.push(this.allocateMatch(match));
    }

    this.log('info', 'general', `Allocation finished with ${this.warnings.length} warnings`);
    return this.allocations;
  }

  private allocateMatch(match: MatchDescriptor): MatchAllocation {
    const { players: available, unknownIds } = resolveAvailablePlayers(
      this.roster,
      match.availablePlayerIds
    );
    for (const id of unknownIds) {
      this.warn(
        {
          type: 'unknown_player',
          matchId: match.id,
          message: `${match.title}: "${id}" is not on the roster`,
          details: { playerId: id },
        },
        'roster'
      );
    }

    const slotTarget = match.slotTarget ?? this.config.slotTarget;
    const selected: Player[] = [];

    const goalkeeper = this.selectGoalkeeper(match, available, slotTarget);
    if (goalkeeper) {
      selected.push(goalkeeper);
    }

    this.fillSlots(match, available, selected, slotTarget);
    const shortfallReserves = this.fillShortfall(match, available, selected, slotTarget);

    if (selected.length < slotTarget) {
      this.warn(
        {
          type: 'unfilled_slot',
          matchId: match.id,
          message: `${match.title}: filled ${selected.length} of ${slotTarget} slots`,
          details: { filled: selected.length, slotTarget },
        },
        'slots'
      );
    }

    const selectedIds = new Set(selected.map((p) => p.id));
    const remaining = available.filter((p) => !selectedIds.has(p.id));
    const reserveChain = this.buildReserveChain(match, remaining);
    const chainIds = new Set(reserveChain.map((p) => p.id));
    const possibleReserves = remaining.filter((p) => !chainIds.has(p.id));

    return {
      matchId: match.id,
      title: match.title,
      venueKind: match.venueKind,
      goalkeeper: goalkeeper?.id ?? null,
      selected: selected.map((p) => p.id),
      shortfallReserves: shortfallReserves.map((p) => p.id),
      reserveChain: reserveChain.map((p) => p.id),
      possibleReserves: possibleReserves.map((p) => p.id),
    };
  }

  private selectGoalkeeper(
    match: MatchDescriptor,
    available: Player[],
    slotTarget: number
  ): Player | undefined {
    if (match.needsGoalkeeper === false || slotTarget < 1) {
      return undefined;
    }

    const candidates = available.filter((p) =>
      isGoalkeeperEligible(this.roster, p.id, match.venueKind, this.config)
    );
    const goalkeeper = pickGoalkeeper(candidates, this.config.preferGkVolunteers);

    if (!goalkeeper) {
      this.warn(
        {
          type: 'no_eligible_goalkeeper',
          matchId: match.id,
          message: `${match.title}: no available player is eligible to keep goal`,
          details: { available: available.length, gkCap: this.config.gkCap },
        },
        'goalkeeper'
      );
      return undefined;
    }

    this.roster.incrementGoalkeeperCalls(goalkeeper.id);
    incrementVenueCalls(this.roster, goalkeeper.id, match.venueKind);
    this.log('debug', 'goalkeeper', `${match.title}: ${goalkeeper.name} keeps goal`, {
      matchId: match.id,
      playerId: goalkeeper.id,
      volunteer: goalkeeper.willingGoalkeeper,
    });
    return goalkeeper;
  }

  /**
   * Fill slots in roster order with players under their venue cap
   */
  private fillSlots(
    match: MatchDescriptor,
    available: Player[],
    selected: Player[],
    slotTarget: number
  ): void {
    for (const player of available) {
      if (selected.length >= slotTarget) break;
      if (selected.includes(player)) continue;
      if (!hasVenueCapacity(this.roster, player.id, match.venueKind, this.config)) continue;

      incrementVenueCalls(this.roster, player.id, match.venueKind);
      selected.push(player);
    }

    this.log('debug', 'slots', `${match.title}: ${selected.length} called up`, {
      matchId: match.id,
      venueKind: match.venueKind,
      slotTarget,
    });
  }

  /**
   * Top up a short match with reserve volunteers. They are counted as
   * reserve calls, so the venue caps still hold.
   */
  private fillShortfall(
    match: MatchDescriptor,
    available: Player[],
    selected: Player[],
    slotTarget: number
  ): Player[] {
    if (!this.config.fillShortfallFromReserves) return [];

    const added: Player[] = [];
    for (const player of available) {
      if (selected.length >= slotTarget) break;
      if (selected.includes(player) || !player.willingMoreMatches) continue;

      this.roster.incrementReserveCalls(player.id);
      selected.push(player);
      added.push(player);
    }

    if (added.length > 0) {
      this.log('info', 'reserve', `${match.title}: ${added.length} reserve volunteers fill the shortfall`, {
        matchId: match.id,
        added: added.map((p) => p.id).join(', '),
      });
    }
    return added;
  }

  private buildReserveChain(match: MatchDescriptor, remaining: Player[]): Player[] {
    if (remaining.length === 0) return [];

    let chain: Player[];
    if (this.config.requireExactReserveFour) {
      if (remaining.length !== RESERVE_CHAIN_SIZE) {
        this.warn(
          {
            type: 'reserve_chain_skipped',
            matchId: match.id,
            message: `${match.title}: ${remaining.length} players left, reserve chain needs exactly ${RESERVE_CHAIN_SIZE}`,
            details: { remaining: remaining.length },
          },
          'reserve'
        );
        return [];
      }
      chain = remaining;
    } else {
      chain = remaining.slice(0, RESERVE_CHAIN_SIZE);
    }

    for (const player of chain) {
      this.roster.incrementReserveCalls(player.id);
    }
    this.log('debug', 'reserve', `${match.title}: reserve chain of ${chain.length}`, {
      matchId: match.id,
    });
    return chain;
  }

  getWarnings(): AllocationWarning[] {
    return this.warnings;
  }

  getAllocationLog(): AllocationLogEntry[] {
    return this.allocationLog;
  }
}
