/**
 * Matcher Application
 *
 * Runs a matcher's extraction pattern against one line and builds a record
 * with exactly the matcher's columns, or returns null when the line does not
 * fit the layout.
 */

import type { ColumnName, VoterRecord } from '../types';
import type { FormatMatcher } from './types';
import { groupName } from './patterns';

export function tryMatch(matcher: FormatMatcher, line: string): VoterRecord | null {
  const match = matcher.pattern.exec(line);
  if (!match?.groups) return null;

  const fields: Partial<Record<ColumnName, string>> = {};
  for (const column of matcher.columns) {
    const value = match.groups[groupName(column)]?.trim();
    // A record is either complete or not emitted at all
    if (!value) return null;
    fields[column] = value;
  }

  return Object.freeze({ layout: matcher.layout, fields: Object.freeze(fields) });
}

/**
 * Freeze a matcher definition so registered rules cannot be altered later.
 */
export function defineMatcher(matcher: FormatMatcher): FormatMatcher {
  for (const column of matcher.columns) {
    const name = groupName(column);
    if (!matcher.pattern.source.includes(`(?<${name}>`)) {
      throw new Error(`Matcher "${matcher.layout}" has no capture group for column "${column}"`);
    }
  }
  if (!matcher.columns.includes(matcher.naturalKey)) {
    throw new Error(`Matcher "${matcher.layout}" does not declare its natural key "${matcher.naturalKey}"`);
  }
  return Object.freeze({
    ...matcher,
    columns: Object.freeze([...matcher.columns]),
    rejectionPatterns: Object.freeze([...matcher.rejectionPatterns]),
  });
}
