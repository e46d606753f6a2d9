/**
 * Document Aggregator
 *
 * Walks a document page by page and line by line, classifying each line
 * and accumulating parsed records in page order, then line order.
 */

import type { RawLine, SkipReason, VoterRecord } from './types';
import type { TextDocument, TextSource } from './text-source';
import type { FormatMatcher } from './matchers/types';
import { createLineClassifier } from './classifier';
import { DocumentReadError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { config } from './config';

export interface ProgressEvent {
  pagesProcessed: number;
  totalPages: number;
  recordsFound: number;
}

export interface AggregateOptions {
  logger?: Logger;
  /** Emit progress every N pages and on the last page */
  progressInterval?: number;
  minLineLength?: number;
  matchers?: readonly FormatMatcher[];
  onProgress?: (event: ProgressEvent) => void;
}

export interface AggregateResult {
  records: VoterRecord[];
  totalPages: number;
  pagesProcessed: number;
  /** Pages whose text could not be extracted; treated as empty */
  pagesFailed: number;
  linesScanned: number;
  skipped: Record<SkipReason, number>;
}

/**
 * Extract every record from one document.
 *
 * @throws DocumentReadError when the document cannot be opened
 */
export async function aggregateDocument(
  source: TextSource,
  filePath: string,
  options: AggregateOptions = {}
): Promise<AggregateResult> {
  const log = options.logger ?? defaultLogger;
  const progressInterval = Math.max(1, options.progressInterval ?? config.progressInterval);
  const classify = createLineClassifier({
    minLineLength: options.minLineLength,
    matchers: options.matchers,
  });

  let document: TextDocument;
  try {
    document = await source.open(filePath);
  } catch (error) {
    throw new DocumentReadError(filePath, error);
  }

  const result: AggregateResult = {
    records: [],
    totalPages: document.totalPages,
    pagesProcessed: 0,
    pagesFailed: 0,
    linesScanned: 0,
    skipped: { too_short: 0, rejected: 0, unmatched: 0 },
  };

  try {
    for (let pageNumber = 1; pageNumber <= document.totalPages; pageNumber++) {
      let lines: string[];
      try {
        lines = await document.getPageLines(pageNumber);
      } catch (error) {
        result.pagesFailed++;
        log.warn('Page text extraction failed, treating page as empty', {
          pageNumber,
          error: error instanceof Error ? error.message : String(error),
        });
        lines = [];
      }

      for (const text of lines) {
        const line: RawLine = { pageNumber, text };
        result.linesScanned++;
        const classification = classify(line.text);
        if (classification.kind === 'parsed') {
          result.records.push(classification.record);
        } else {
          result.skipped[classification.reason]++;
          if (classification.reason === 'unmatched') {
            log.debug('Line matched no layout', { ...line });
          }
        }
      }

      result.pagesProcessed = pageNumber;

      if (pageNumber % progressInterval === 0 || pageNumber === document.totalPages) {
        const event: ProgressEvent = {
          pagesProcessed: pageNumber,
          totalPages: document.totalPages,
          recordsFound: result.records.length,
        };
        log.info('Conversion progress', { ...event });
        options.onProgress?.(event);
      }
    }
  } catch (error) {
    await closeQuietly(document, log);
    throw error;
  }

  await document.close();
  return result;
}

/**
 * Release a document after the page walk already failed; the walk's error
 * is the one the caller sees.
 */
async function closeQuietly(document: TextDocument, log: Logger): Promise<void> {
  try {
    await document.close();
  } catch (error) {
    log.warn('Failed to close document after error', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
