/**
 * Document Converter
 *
 * Converts one report into a CSV file: aggregate records across pages,
 * validate them against their layout, drop duplicate State IDs (first
 * occurrence wins) and write the result.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ColumnName, ConversionResult, LayoutId, VoterRecord } from './types';
import { isColumnName } from './types';
import type { TextSource } from './text-source';
import type { FormatMatcher } from './matchers/types';
import { aggregateDocument, type ProgressEvent } from './aggregator';
import { deduplicateRecords } from './dedup';
import { writeCsv } from './csv';
import { validateRecord } from './schemas';
import { DocumentNotFoundError, OutputWriteError } from './errors';
import { getContext, newCorrelationId, runWithContextAsync } from './context';
import { logger as defaultLogger, type Logger } from './logger';
import { config } from './config';
import { getMatchers } from './matchers';
import {
  documentsConvertedCounter,
  conversionDurationHistogram,
  pagesFailedCounter,
  recordsParsedCounter,
  linesSkippedCounter,
  duplicatesRemovedCounter,
} from './metrics';

export interface ConvertOptions {
  source: TextSource;
  /** Defaults to `<dir>/<stem><suffix>.csv` beside the source */
  outputFile?: string;
  outputSuffix?: string;
  naturalKey?: ColumnName;
  logger?: Logger;
  progressInterval?: number;
  minLineLength?: number;
  matchers?: readonly FormatMatcher[];
  onProgress?: (event: ProgressEvent) => void;
}

/**
 * Output path derived from the source name: `report.pdf` -> `report_converted.csv`.
 */
export function defaultOutputPath(sourceFile: string, suffix: string = config.outputSuffix): string {
  const parsed = path.parse(sourceFile);
  return path.join(parsed.dir, `${parsed.name}${suffix}.csv`);
}

function configuredNaturalKey(): ColumnName {
  if (!isColumnName(config.naturalKey)) {
    throw new Error(`NATURAL_KEY is not a known column: ${config.naturalKey}`);
  }
  return config.naturalKey;
}

function layoutsOf(records: readonly VoterRecord[]): LayoutId[] {
  return [...new Set(records.map((r) => r.layout))];
}

/**
 * Convert a single document.
 *
 * @throws DocumentNotFoundError when the source file does not exist
 * @throws DocumentReadError when the source cannot be decoded
 * @throws OutputWriteError when the CSV cannot be written
 */
export async function convertDocument(
  sourceFile: string,
  options: ConvertOptions
): Promise<ConversionResult> {
  const parent = getContext();

  return runWithContextAsync(
    {
      correlationId: newCorrelationId(),
      batchId: parent?.batchId,
      sourceFile: path.basename(sourceFile),
    },
    async () => {
      const log = options.logger ?? defaultLogger;
      const startTime = Date.now();

      try {
        if (!fs.existsSync(sourceFile)) {
          throw new DocumentNotFoundError(sourceFile);
        }

        const outputFile = options.outputFile ?? defaultOutputPath(sourceFile, options.outputSuffix);
        const naturalKey = options.naturalKey ?? configuredNaturalKey();

        const matchers = options.matchers ?? getMatchers();

        log.info('Starting conversion', { sourceFile, outputFile });

        const aggregate = await aggregateDocument(options.source, sourceFile, {
          logger: log,
          progressInterval: options.progressInterval,
          minLineLength: options.minLineLength,
          matchers,
          onProgress: options.onProgress,
        });

        const valid = aggregate.records.filter((record) => {
          const validation = validateRecord(record, matchers);
          if (!validation.valid) {
            log.warn('Dropping record that does not fit its layout', {
              layout: record.layout,
              errors: validation.errors,
            });
          }
          return validation.valid;
        });

        for (const record of valid) {
          recordsParsedCounter.inc({ layout: record.layout });
        }
        for (const [reason, count] of Object.entries(aggregate.skipped)) {
          linesSkippedCounter.inc({ reason }, count);
        }
        pagesFailedCounter.inc(aggregate.pagesFailed);

        const layouts = layoutsOf(valid);
        const baseResult = {
          sourceFile,
          layouts,
          pagesProcessed: aggregate.pagesProcessed,
          pagesFailed: aggregate.pagesFailed,
          linesScanned: aggregate.linesScanned,
          recordsParsed: valid.length,
        };

        if (valid.length === 0) {
          log.warn('No voter records found', {
            sourceFile,
            pagesProcessed: aggregate.pagesProcessed,
            linesScanned: aggregate.linesScanned,
          });
          documentsConvertedCounter.inc({ status: 'empty' });
          return {
            ...baseResult,
            outputFile: null,
            duplicatesRemoved: 0,
            recordsWritten: 0,
            durationMs: Date.now() - startTime,
            completedAt: new Date().toISOString(),
          };
        }

        if (layouts.length > 1) {
          log.warn('Document mixes report layouts, writing union of columns', { layouts });
        }

        const deduped = deduplicateRecords(valid, naturalKey);
        if (deduped.duplicatesRemoved > 0) {
          log.info(`Removed ${deduped.duplicatesRemoved} duplicate ${naturalKey} values`, {
            duplicatesRemoved: deduped.duplicatesRemoved,
          });
          duplicatesRemovedCounter.inc(deduped.duplicatesRemoved);
        }

        try {
          writeCsv(outputFile, deduped.records, matchers);
        } catch (error) {
          throw new OutputWriteError(sourceFile, outputFile, error);
        }

        const durationMs = Date.now() - startTime;
        conversionDurationHistogram.observe(durationMs / 1000);
        documentsConvertedCounter.inc({ status: 'success' });

        log.info('Conversion complete', {
          sourceFile,
          outputFile,
          recordsWritten: deduped.records.length,
          durationMs,
        });

        return {
          ...baseResult,
          outputFile,
          duplicatesRemoved: deduped.duplicatesRemoved,
          recordsWritten: deduped.records.length,
          durationMs,
          completedAt: new Date().toISOString(),
        };
      } catch (error) {
        documentsConvertedCounter.inc({ status: 'error' });
        log.error('Conversion failed', error, { sourceFile });
        throw error;
      }
    }
  );
}
