/**
 * Format Matcher Types
 *
 * A matcher is a pure data rule describing one report layout: which lines
 * are structural noise for it, how a data line decomposes into fields, and
 * the column order its records carry.
 */

import type { ColumnName, LayoutId } from '../types';

export interface FormatMatcher {
  /** Layout identity stamped on every record this matcher produces */
  readonly layout: LayoutId;

  /** Human-readable description of the report this layout comes from */
  readonly description: string;

  /** Output columns, in CSV order */
  readonly columns: readonly ColumnName[];

  /**
   * Line-anchored patterns for headers, titles and banners specific to this
   * layout. Checked for every line before any matcher runs.
   */
  readonly rejectionPatterns: readonly RegExp[];

  /**
   * Anchored extraction pattern. Each column is captured by a named group;
   * group names are the column names with non-word characters removed
   * (`State ID` -> `StateID`).
   */
  readonly pattern: RegExp;

  /** Column used to detect duplicate records */
  readonly naturalKey: ColumnName;
}
