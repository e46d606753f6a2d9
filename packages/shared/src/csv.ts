/**
 * CSV Serialization
 *
 * RFC 4180 output: header row, one row per record, no index column.
 */

import fs from 'node:fs';
import path from 'node:path';
import { COLUMN_NAMES, type ColumnName, type VoterRecord } from './types';
import type { FormatMatcher } from './matchers/types';
import { getMatchers } from './matchers';

/**
 * Quote a CSV field per RFC 4180.
 * Fields containing commas, double quotes, or newlines are wrapped
 * in double quotes. Internal double quotes are escaped by doubling.
 */
export function csvQuote(value: string): string {
  if (
    value.includes(',') ||
    value.includes('"') ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Column order for a record set: the first record's layout, then the
 * columns of later layouts that are not already present. A new column is
 * placed right after the column that precedes it in its own layout, so
 * `Polling Place` still lands before `Precinct` when a 4-column check-in
 * row comes first.
 */
export function resolveColumns(
  records: readonly VoterRecord[],
  matchers: readonly FormatMatcher[] = getMatchers()
): ColumnName[] {
  const columns: ColumnName[] = [];
  const seenLayouts = new Set<string>();

  for (const record of records) {
    if (seenLayouts.has(record.layout)) continue;
    seenLayouts.add(record.layout);

    const declared = matchers.find((m) => m.layout === record.layout)?.columns ?? columnsOf(record);
    let anchor = -1;
    for (const column of declared) {
      const at = columns.indexOf(column);
      if (at === -1) {
        anchor++;
        columns.splice(anchor, 0, column);
      } else {
        anchor = at;
      }
    }
  }

  return columns;
}

function columnsOf(record: VoterRecord): ColumnName[] {
  return COLUMN_NAMES.filter((column) => record.fields[column] !== undefined);
}

export function serializeCsv(
  records: readonly VoterRecord[],
  columns: readonly ColumnName[] = resolveColumns(records)
): string {
  const lines = [columns.map(csvQuote).join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => csvQuote(record.fields[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

export function writeCsv(
  filePath: string,
  records: readonly VoterRecord[],
  matchers?: readonly FormatMatcher[]
): ColumnName[] {
  const columns = resolveColumns(records, matchers);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, serializeCsv(records, columns), 'utf-8');
  return columns;
}
