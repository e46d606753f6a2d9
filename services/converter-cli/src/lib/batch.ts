/**
 * Batch Conversion
 *
 * Converts a single report or every PDF directly inside a folder. Each
 * document is converted on its own; a failing document is recorded and
 * the batch moves on.
 */

import fs from 'fs';
import path from 'path';
import {
  convertDocument,
  isConversionError,
  newCorrelationId,
  runWithContextAsync,
  DocumentNotFoundError,
  logger as defaultLogger,
  type BatchSummary,
  type ConvertOptions,
  type Logger,
} from '@checkin/shared';

export interface BatchOptions extends Pick<ConvertOptions, 'source' | 'onProgress' | 'outputSuffix'> {
  /** Only honoured when the input is a single file */
  outputFile?: string;
  logger?: Logger;
}

const PDF_EXTENSION = /\.pdf$/i;

/**
 * PDFs directly inside a folder, sorted by name.
 */
export function findPdfFiles(folder: string): string[] {
  return fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() && PDF_EXTENSION.test(entry.name))
    .map((entry) => path.join(folder, entry.name))
    .sort();
}

/**
 * @throws DocumentNotFoundError when the input path does not exist
 */
export async function runBatch(input: string, options: BatchOptions): Promise<BatchSummary> {
  const log = options.logger ?? defaultLogger;
  const batchId = newCorrelationId();

  return runWithContextAsync({ correlationId: batchId, batchId }, async () => {
    if (!fs.existsSync(input)) {
      throw new DocumentNotFoundError(input);
    }

    const isFolder = fs.statSync(input).isDirectory();
    const files = isFolder ? findPdfFiles(input) : [input];

    if (isFolder && options.outputFile) {
      log.warn('Output file name ignored for folder conversion', { outputFile: options.outputFile });
    }

    const summary: BatchSummary = {
      input,
      filesFound: files.length,
      filesConverted: 0,
      totalRecords: 0,
      results: [],
      failures: [],
    };

    if (files.length === 0) {
      log.warn('No PDF files found in folder', { folder: input });
      return summary;
    }

    log.info(`Found ${files.length} PDF(s), converting`, { input });

    for (const file of files) {
      try {
        const result = await convertDocument(file, {
          source: options.source,
          outputFile: isFolder ? undefined : options.outputFile,
          outputSuffix: options.outputSuffix,
          logger: log,
          onProgress: options.onProgress,
        });
        summary.results.push(result);
        if (result.recordsWritten > 0) {
          summary.filesConverted++;
          summary.totalRecords += result.recordsWritten;
        }
      } catch (error) {
        summary.failures.push({
          sourceFile: file,
          code: isConversionError(error) ? error.code : 'UNEXPECTED',
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    log.info('Batch conversion finished', {
      filesFound: summary.filesFound,
      filesConverted: summary.filesConverted,
      totalRecords: summary.totalRecords,
      failures: summary.failures.length,
    });

    return summary;
  });
}
