/**
 * Shared TypeScript Types
 *
 * Types for the voter check-in report conversion pipeline.
 */

// ============================================================================
// Layouts & Columns
// ============================================================================

export type LayoutId =
  | 'checkin'
  | 'checkin_polling_place'
  | 'mailed_ballot'
  | 'personal_appearance';

export const COLUMN_NAMES = [
  'No',
  'Election',
  'Pct',
  'Name',
  'State ID',
  'Polling Place',
  'Precinct',
] as const;

export type ColumnName = (typeof COLUMN_NAMES)[number];

export function isColumnName(value: string): value is ColumnName {
  return COLUMN_NAMES.some((column) => column === value);
}

// ============================================================================
// Records
// ============================================================================

/**
 * One parsed voter row. `fields` holds exactly the columns declared by the
 * matcher that produced it, in declaration order.
 */
export interface VoterRecord {
  readonly layout: LayoutId;
  readonly fields: Readonly<Partial<Record<ColumnName, string>>>;
}

export interface RawLine {
  pageNumber: number;
  text: string;
}

// ============================================================================
// Classification
// ============================================================================

export type SkipReason = 'too_short' | 'rejected' | 'unmatched';

export type LineClassification =
  | { kind: 'skip'; reason: SkipReason }
  | { kind: 'parsed'; record: VoterRecord };

// ============================================================================
// Conversion Results
// ============================================================================

export interface ConversionResult {
  sourceFile: string;
  /** Null when no records were found and nothing was written */
  outputFile: string | null;
  layouts: LayoutId[];
  pagesProcessed: number;
  pagesFailed: number;
  linesScanned: number;
  recordsParsed: number;
  duplicatesRemoved: number;
  recordsWritten: number;
  durationMs: number;
  completedAt: string;
}

export interface BatchFailure {
  sourceFile: string;
  code: string;
  message: string;
}

export interface BatchSummary {
  input: string;
  filesFound: number;
  filesConverted: number;
  totalRecords: number;
  results: ConversionResult[];
  failures: BatchFailure[];
}
