/**
 * Match descriptor types
 * Matches arrive already tagged with a venue kind; title parsing happens
 * during roster import
 */

export type VenueKind = 'home' | 'away';

/**
 * Result of classifying a column title. 'unknown' means the column is not a match.
 */
export type MatchTitleKind = VenueKind | 'unknown';

export interface MatchDescriptor {
  id: string;
  title: string;
  venueKind: VenueKind;
  availablePlayerIds: string[];
  needsGoalkeeper?: boolean; // Default: true
  slotTarget?: number; // Total call-ups for this match, goalkeeper included. Default: config.slotTarget
}
