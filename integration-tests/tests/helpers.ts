/**
 * Test Helpers
 *
 * In-process stand-ins for the PDF text source and the log sink.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type {
  LogContext,
  Logger,
  TextDocument,
  TextSource,
  VoterRecord,
  ColumnName,
  LayoutId,
} from '@checkin/shared';

/** A page's lines, or the error extracting it raises */
export type FakePage = string[] | Error;

export interface MemoryTextSourceOptions {
  /** Raised by every `close` after the handle is counted as closed */
  closeError?: Error;
}

/**
 * TextSource backed by in-memory pages, keyed by file base name.
 * An Error in place of the page list makes `open` fail.
 */
export class MemoryTextSource implements TextSource {
  opened = 0;
  closed = 0;

  constructor(
    private readonly documents: Record<string, FakePage[] | Error>,
    private readonly options: MemoryTextSourceOptions = {}
  ) {}

  async open(filePath: string): Promise<TextDocument> {
    const pages = this.documents[path.basename(filePath)];
    if (pages === undefined) {
      throw new Error(`No pages for ${filePath}`);
    }
    if (pages instanceof Error) {
      throw pages;
    }

    this.opened++;
    return {
      totalPages: pages.length,
      getPageLines: async (pageNumber: number) => {
        const page = pages[pageNumber - 1];
        if (page instanceof Error) throw page;
        return [...page];
      },
      close: async () => {
        this.closed++;
        if (this.options.closeError) throw this.options.closeError;
      },
    };
  }
}

export interface CapturedEntry {
  level: 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';
  message: string;
  context?: LogContext;
  error?: unknown;
}

export function createCaptureLogger(): { logger: Logger; entries: CapturedEntry[] } {
  const entries: CapturedEntry[] = [];
  const logger: Logger = {
    info: (message, context) => entries.push({ level: 'INFO', message, context }),
    warn: (message, context) => entries.push({ level: 'WARN', message, context }),
    error: (message, error, context) => entries.push({ level: 'ERROR', message, error, context }),
    debug: (message, context) => entries.push({ level: 'DEBUG', message, context }),
  };
  return { logger, entries };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'checkin-test-'));
}

/**
 * Create a placeholder file so existence checks pass; the content is never
 * decoded by MemoryTextSource.
 */
export function touchFile(dir: string, name: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, '%PDF-1.4 placeholder');
  return filePath;
}

export function checkinRecord(no: string, name: string, stateId: string, precinct: string): VoterRecord {
  return record('checkin', { No: no, Name: name, 'State ID': stateId, Precinct: precinct });
}

export function record(layout: LayoutId, fields: Partial<Record<ColumnName, string>>): VoterRecord {
  return { layout, fields };
}
