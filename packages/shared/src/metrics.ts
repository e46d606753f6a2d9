/**
 * Prometheus Metrics
 *
 * Process-wide conversion counters. A CLI run dumps them to a file in the
 * text exposition format when METRICS_FILE is set.
 */

import fs from 'node:fs';
import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Document Metrics
// ============================================================================

export const documentsConvertedCounter = new promClient.Counter({
  name: 'checkin_documents_converted_total',
  help: 'Total number of documents processed',
  labelNames: ['status'],
  registers: [register],
});

export const conversionDurationHistogram = new promClient.Histogram({
  name: 'checkin_conversion_duration_seconds',
  help: 'Duration of one document conversion',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const pagesFailedCounter = new promClient.Counter({
  name: 'checkin_pages_failed_total',
  help: 'Pages whose text could not be extracted',
  registers: [register],
});

// ============================================================================
// Record Metrics
// ============================================================================

export const recordsParsedCounter = new promClient.Counter({
  name: 'checkin_records_parsed_total',
  help: 'Records parsed before deduplication',
  labelNames: ['layout'],
  registers: [register],
});

export const linesSkippedCounter = new promClient.Counter({
  name: 'checkin_lines_skipped_total',
  help: 'Lines classified as noise',
  labelNames: ['reason'],
  registers: [register],
});

export const duplicatesRemovedCounter = new promClient.Counter({
  name: 'checkin_duplicates_removed_total',
  help: 'Records dropped because their State ID was already seen',
  registers: [register],
});

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export async function writeMetricsFile(filePath: string): Promise<void> {
  fs.writeFileSync(filePath, await getMetrics(), 'utf-8');
}
