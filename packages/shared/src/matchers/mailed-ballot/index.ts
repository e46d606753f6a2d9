/**
 * Mailed Ballot Layout
 *
 *   Election     Pct   State ID     Name
 *   11/05/2024   101   123456789    SMITH, JOHN A
 *
 * The name is the last column and runs to the end of the line.
 */

import { defineMatcher } from '../match';
import { ELECTION_DATE, PRECINCT_NUMBER, STATE_ID } from '../patterns';

export const mailedBallotMatcher = defineMatcher({
  layout: 'mailed_ballot',
  description: 'Mailed ballot report: Election, Pct, State ID, Name',
  columns: ['Election', 'Pct', 'State ID', 'Name'],
  rejectionPatterns: [/^Election\s+Pct/i, /^Mail(ed)?\s+Ballots?/i],
  pattern: new RegExp(
    String.raw`^(?<Election>${ELECTION_DATE})\s+(?<Pct>${PRECINCT_NUMBER})\s+(?<StateID>${STATE_ID})\s+(?<Name>\S.*)$`
  ),
  naturalKey: 'State ID',
});
