import type { Player, PlayerCounters, PlayerInput } from '@callup/shared';

/**
 * Roster model for one allocation run
 * Owns every player record and their call-up counters. Counters are only
 * incremented here; cap checks belong to the allocator.
 */
export class Roster {
  private players: Player[];
  private playersById: Map<string, Player> = new Map();
  private counters: Map<string, PlayerCounters> = new Map();

  constructor(inputs: PlayerInput[]) {
    const players = inputs.map((input, index): Player => ({
      id: input.id,
      name: input.name,
      order: input.order ?? index + 1,
      willingMoreMatches: input.willingMoreMatches,
      willingGoalkeeper: input.willingGoalkeeper,
      awayResponseCount: input.awayResponseCount,
      awayWilling: input.willingMoreMatches,
    }));

    for (const player of players) {
      if (this.playersById.has(player.id)) {
        throw new Error(`Duplicate player id: ${player.id}`);
      }
      this.playersById.set(player.id, player);
      this.counters.set(player.id, createCounters());
    }

    // Stable sort: equal order keys keep their input position
    this.players = players
      .map((player, index) => ({ player, index }))
      .sort((a, b) => a.player.order - b.player.order || a.index - b.index)
      .map(({ player }) => player);
  }

  /**
   * Set awayWilling from the away response count where one is known,
   * otherwise from the static willingness answer. Safe to call repeatedly.
   */
  deriveAwayWillingness(): void {
    for (const player of this.players) {
      player.awayWilling =
        player.awayResponseCount !== undefined
          ? player.awayResponseCount > 0
          : player.willingMoreMatches;
    }
  }

  /**
   * Players sorted by roster order
   */
  getPlayers(): readonly Player[] {
    return this.players;
  }

  getPlayer(id: string): Player | undefined {
    return this.playersById.get(id);
  }

  has(id: string): boolean {
    return this.playersById.has(id);
  }

  get size(): number {
    return this.players.length;
  }

  getCounters(id: string): Readonly<PlayerCounters> {
    return this.countersFor(id);
  }

  incrementHomeCalls(id: string): void {
    this.countersFor(id).homeCalls++;
  }

  incrementAwayCalls(id: string): void {
    this.countersFor(id).awayCalls++;
  }

  incrementGoalkeeperCalls(id: string): void {
    this.countersFor(id).goalkeeperCalls++;
  }

  incrementReserveCalls(id: string): void {
    this.countersFor(id).reserveCalls++;
  }

  private countersFor(id: string): PlayerCounters {
    const counters = this.counters.get(id);
    if (!counters) {
      throw new Error(`Unknown player id: ${id}`);
    }
    return counters;
  }
}

function createCounters(): PlayerCounters {
  return {
    homeCalls: 0,
    awayCalls: 0,
    goalkeeperCalls: 0,
    reserveCalls: 0,
  };
}
