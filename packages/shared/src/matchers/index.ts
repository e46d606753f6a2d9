/**
 * Format Matchers Module
 *
 * One matcher per report layout, tried in fixed priority order:
 * - checkin: No, Name, State ID, Precinct
 * - checkin_polling_place: No, Name, State ID, Polling Place, Precinct
 * - mailed_ballot: Election, Pct, State ID, Name
 * - personal_appearance: Election, Name, State ID, Precinct
 */

export type { FormatMatcher } from './types';

export { tryMatch, defineMatcher } from './match';

export {
  registerMatcher,
  getMatchers,
  getMatcher,
  getMatcherOrThrow,
  getRegisteredLayouts,
  getRejectionPatterns,
} from './registry';

export {
  GLOBAL_REJECTION_PATTERNS,
  ROW_NUMBER,
  STATE_ID,
  PRECINCT_NUMBER,
  ELECTION_DATE,
  CHECKIN_PRECINCT,
  groupName,
} from './patterns';

export { checkinMatcher } from './checkin';
export { checkinPollingPlaceMatcher } from './checkin-polling-place';
export { mailedBallotMatcher } from './mailed-ballot';
export { personalAppearanceMatcher } from './personal-appearance';

// Import for registration
import { registerMatcher, getMatchers } from './registry';
import { checkinMatcher } from './checkin';
import { checkinPollingPlaceMatcher } from './checkin-polling-place';
import { mailedBallotMatcher } from './mailed-ballot';
import { personalAppearanceMatcher } from './personal-appearance';

/**
 * Register all built-in matchers in priority order.
 * No-op when matchers are already registered.
 */
export function registerAllMatchers(): void {
  if (getMatchers().length > 0) return;
  registerMatcher(checkinMatcher);
  registerMatcher(checkinPollingPlaceMatcher);
  registerMatcher(mailedBallotMatcher);
  registerMatcher(personalAppearanceMatcher);
}

// Auto-register all matchers on module load
registerAllMatchers();
