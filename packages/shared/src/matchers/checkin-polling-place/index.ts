/**
 * Check-in Layout with Polling Place
 *
 * Five-column variant (Kerr County style) that prints the polling place
 * between the State ID and the precinct. The polling place may contain
 * spaces; it ends where the `S` precinct token starts.
 */

import { defineMatcher } from '../match';
import { CHECKIN_PRECINCT, ROW_NUMBER, STATE_ID } from '../patterns';

export const checkinPollingPlaceMatcher = defineMatcher({
  layout: 'checkin_polling_place',
  description: 'Voter check-in report: No, Name, State ID, Polling Place, Precinct',
  columns: ['No', 'Name', 'State ID', 'Polling Place', 'Precinct'],
  rejectionPatterns: [],
  pattern: new RegExp(
    String.raw`^(?<No>${ROW_NUMBER})\s+(?<Name>.+?)\s+(?<StateID>${STATE_ID})\s+(?<PollingPlace>.+?)\s+(?<Precinct>${CHECKIN_PRECINCT})$`
  ),
  naturalKey: 'State ID',
});
