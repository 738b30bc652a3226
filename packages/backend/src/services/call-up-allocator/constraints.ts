import type { AllocationConfig, Player, VenueKind } from '@callup/shared';
import type { Roster } from './roster.js';

/**
 * Get the per-player cap for a venue kind
 */
export function venueCap(venueKind: VenueKind, config: AllocationConfig): number {
  return venueKind === 'home' ? config.maxHomeBase : config.maxAwayBase;
}

/**
 * Get how many call-ups of this venue kind a player already has
 */
export function venueCalls(roster: Roster, playerId: string, venueKind: VenueKind): number {
  const counters = roster.getCounters(playerId);
  return venueKind === 'home' ? counters.homeCalls : counters.awayCalls;
}

/**
 * Check if a player can take one more call-up of this venue kind
 */
export function hasVenueCapacity(
  roster: Roster,
  playerId: string,
  venueKind: VenueKind,
  config: AllocationConfig
): boolean {
  return venueCalls(roster, playerId, venueKind) < venueCap(venueKind, config);
}

/**
 * Check if a player can keep goal in this match.
 * The goalkeeper call-up also counts toward the venue cap.
 */
export function isGoalkeeperEligible(
  roster: Roster,
  playerId: string,
  venueKind: VenueKind,
  config: AllocationConfig
): boolean {
  return (
    roster.getCounters(playerId).goalkeeperCalls < config.gkCap &&
    hasVenueCapacity(roster, playerId, venueKind, config)
  );
}

/**
 * Pick a goalkeeper from candidates already in roster order.
 * Volunteers win when preferred; otherwise the first candidate wins.
 */
export function pickGoalkeeper(
  candidates: readonly Player[],
  preferVolunteers: boolean
): Player | undefined {
  if (preferVolunteers) {
    const volunteer = candidates.find((p) => p.willingGoalkeeper);
    if (volunteer) return volunteer;
  }
  return candidates[0];
}

/**
 * Record a home or away call-up
 */
export function incrementVenueCalls(roster: Roster, playerId: string, venueKind: VenueKind): void {
  if (venueKind === 'home') {
    roster.incrementHomeCalls(playerId);
  } else {
    roster.incrementAwayCalls(playerId);
  }
}

/**
 * Split available ids into roster-ordered players and ids the roster doesn't know
 */
export function resolveAvailablePlayers(
  roster: Roster,
  availablePlayerIds: readonly string[]
): { players: Player[]; unknownIds: string[] } {
  const available = new Set(availablePlayerIds);
  const unknownIds = [...available].filter((id) => !roster.has(id));
  const players = roster.getPlayers().filter((p) => available.has(p.id));
  return { players, unknownIds };
}
