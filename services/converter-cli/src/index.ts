#!/usr/bin/env node
/**
 * Converter CLI
 *
 * Usage:
 *   checkin-convert <report.pdf | folder> [output.csv]
 *
 * Converts voter check-in report PDFs into CSV files. A folder converts
 * every PDF directly inside it, each to `<name>_converted.csv`.
 */

import fs from 'fs';
import {
  config,
  logger,
  validateBatchSummary,
  writeMetricsFile,
  type BatchSummary,
} from '@checkin/shared';
import { PdfTextSource } from './lib/pdf';
import { runBatch } from './lib/batch';

function printSummary(summary: BatchSummary): void {
  console.log('='.repeat(60));
  console.log(`${summary.filesConverted}/${summary.filesFound} files converted`);
  console.log(`Total unique voter records: ${summary.totalRecords}`);
  for (const failure of summary.failures) {
    console.log(`Failed: ${failure.sourceFile} (${failure.code}) ${failure.message}`);
  }
  console.log('='.repeat(60));
}

async function main(): Promise<number> {
  const [input, outputFile] = process.argv.slice(2);
  if (!input) {
    console.error('Usage: checkin-convert <report.pdf | folder> [output.csv]');
    return 2;
  }

  const summary = await runBatch(input, {
    source: new PdfTextSource(),
    outputFile,
    onProgress: ({ pagesProcessed, totalPages, recordsFound }) => {
      console.log(`   -> Page ${pagesProcessed}/${totalPages}  (${recordsFound} records so far)`);
    },
  });

  printSummary(summary);

  if (config.summaryFile) {
    const validation = validateBatchSummary(summary);
    if (validation.valid) {
      fs.writeFileSync(config.summaryFile, JSON.stringify(summary, null, 2), 'utf-8');
      logger.info('Batch summary written', { summaryFile: config.summaryFile });
    }
  }

  if (config.metricsFile) {
    await writeMetricsFile(config.metricsFile);
    logger.info('Metrics written', { metricsFile: config.metricsFile });
  }

  const allFailed = summary.filesFound > 0 && summary.failures.length === summary.filesFound;
  return allFailed ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('Conversion run failed', error);
    process.exitCode = 1;
  });
