import type { DocumentStore } from './database.js';
import { isSport, type Sport } from './types.js';

export const TEAM_COLLECTION = 'team';

const SPORT_PREFIX: Record<Sport, string> = {
  cricket: 'CRK',
  football: 'FTB',
  kabaddi: 'KBD',
  shuttle: 'SHT',
  tennis: 'TNS'
};

const FALLBACK_PREFIX = 'TMP';
const FIRST_TEAM_NUMBER = 100;

export type TeamIdAllocation =
  | { status: 'counted'; teamId: string; count: number }
  | { status: 'degraded'; teamId: string; reason: string };

export function sportPrefix(sport: string): string {
  return isSport(sport) ? SPORT_PREFIX[sport] : FALLBACK_PREFIX;
}

export function formatTeamId(sport: string, existingCount: number): string {
  return `${sportPrefix(sport)}-${FIRST_TEAM_NUMBER + existingCount}`;
}

/**
 * Mints the identifier for the next team of a sport from the live count in
 * storage. Read-only: the caller persists the team.
 *
 * A failed count does not fail the registration; the result comes back
 * `degraded`, numbered as if no team of that sport existed. Two concurrent
 * registrations of one sport can read the same count and mint the same id.
 */
export function allocateTeamId(store: DocumentStore, sport: string): TeamIdAllocation {
  try {
    const count = store.count(TEAM_COLLECTION, { sport });
    return { status: 'counted', teamId: formatTeamId(sport, count), count };
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    console.warn(`Team count for ${sport} failed, numbering from ${FIRST_TEAM_NUMBER}: ${reason}`);
    return { status: 'degraded', teamId: formatTeamId(sport, 0), reason };
  }
}
