/**
 * Check-in Layout
 *
 * Four-column voter check-in report (Medina County style):
 *
 *   No.  Name            State ID    Precinct
 *   12   JOHN A SMITH    123456789   S PCT 1
 */

import { defineMatcher } from '../match';
import { CHECKIN_PRECINCT, ROW_NUMBER, STATE_ID } from '../patterns';

export const checkinMatcher = defineMatcher({
  layout: 'checkin',
  description: 'Voter check-in report: No, Name, State ID, Precinct',
  columns: ['No', 'Name', 'State ID', 'Precinct'],
  rejectionPatterns: [],
  pattern: new RegExp(
    String.raw`^(?<No>${ROW_NUMBER})\s+(?<Name>.+?)\s+(?<StateID>${STATE_ID})\s+(?<Precinct>${CHECKIN_PRECINCT})$`
  ),
  naturalKey: 'State ID',
});
