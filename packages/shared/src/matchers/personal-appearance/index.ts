/**
 * Personal Appearance Layout
 *
 * Early-voting personal appearance roster:
 *
 *   Election     Name             State ID     Precinct
 *   11/05/2024   SMITH, JOHN A    123456789    101
 */

import { defineMatcher } from '../match';
import { ELECTION_DATE, STATE_ID } from '../patterns';

export const personalAppearanceMatcher = defineMatcher({
  layout: 'personal_appearance',
  description: 'Personal appearance report: Election, Name, State ID, Precinct',
  columns: ['Election', 'Name', 'State ID', 'Precinct'],
  rejectionPatterns: [/^Election\s+Name/i, /^Personal\s+Appearance/i],
  pattern: new RegExp(
    String.raw`^(?<Election>${ELECTION_DATE})\s+(?<Name>.+?)\s+(?<StateID>${STATE_ID})\s+(?<Precinct>\S.*)$`
  ),
  naturalKey: 'State ID',
});
