/**
 * Deduplicator
 *
 * Drops records whose natural key was already seen earlier in the
 * sequence. The first occurrence wins, so the result depends on page and
 * line order.
 */

import type { ColumnName, VoterRecord } from './types';

export interface DeduplicationResult {
  records: VoterRecord[];
  duplicatesRemoved: number;
}

export function deduplicateRecords(
  records: readonly VoterRecord[],
  keyField: ColumnName = 'State ID'
): DeduplicationResult {
  const seen = new Set<string>();
  const kept: VoterRecord[] = [];

  for (const record of records) {
    const key = record.fields[keyField]?.trim();
    // Records without a key are kept as unique
    if (!key) {
      kept.push(record);
      continue;
    }
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(record);
  }

  return { records: kept, duplicatesRemoved: records.length - kept.length };
}
