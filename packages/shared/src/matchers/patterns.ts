/**
 * Shared Extraction Patterns
 *
 * Field shapes reused across layouts, and the rejection patterns for
 * structural lines that appear in every report (column headers, report
 * banners, metadata rows, page footers).
 */

/** Row number printed in the first column of check-in reports */
export const ROW_NUMBER = String.raw`\d{1,4}`;

/**
 * State voter ID. The length bounds keep page numbers and precinct codes
 * from being read as IDs.
 */
export const STATE_ID = String.raw`\d{9,12}`;

/** Numeric precinct code used by the mailed-ballot report */
export const PRECINCT_NUMBER = String.raw`\d{1,4}`;

/** Election column: the election date, m/d/yyyy */
export const ELECTION_DATE = String.raw`\d{1,2}/\d{1,2}/\d{4}`;

/**
 * Check-in precinct: an `S` token followed by the precinct label, running
 * to the end of the line (`S PCT 1`, `S 12-A`).
 */
export const CHECKIN_PRECINCT = String.raw`S\s+\S.*`;

export const GLOBAL_REJECTION_PATTERNS: readonly RegExp[] = [
  /^No\./i,
  /^Name/i,
  /^State ID/i,
  /^Polling Place/i,
  /^Precinct/i,
  /^County Name/i,
  /^Election Name/i,
  /^Report/i,
  /^From\b/i,
  /^To\b/i,
  /^ePulse/i,
  /^Voter Check-in/i,
  /^Website Post Report/i,
  /^Page\s+\d+/i,
];

/**
 * Named capture group for a column: `State ID` -> `StateID`.
 */
export function groupName(column: string): string {
  return column.replace(/\W/g, '');
}
