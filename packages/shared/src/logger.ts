/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * Lines go to the console and, when configured, are appended to a log file.
 */

import fs from 'node:fs';
import { getCorrelationId, getContext } from './context';
import { config } from './config';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | unknown, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  /** Append-only log file; empty or null disables file output */
  logFile?: string | null;
  level?: string;
  /** Defaults to true */
  console?: boolean;
}

export function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    batchId: reqContext?.batchId,
    sourceFile: reqContext?.sourceFile,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function serializeError(error: unknown): { message: string; stack?: string; name: string } | string {
  return error instanceof Error
    ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      }
    : String(error);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const logFile = options.logFile || null;
  const useConsole = options.console ?? true;
  const debugEnabled = (options.level ?? config.logLevel) === 'debug';

  const emit = (line: string, write: (line: string) => void) => {
    if (useConsole) write(line);
    if (logFile) fs.appendFileSync(logFile, `${line}\n`, 'utf-8');
  };

  return {
    info: (message, context) => {
      emit(formatLog('INFO', message, context), (line) => console.log(line));
    },

    warn: (message, context) => {
      emit(formatLog('WARN', message, context), (line) => console.warn(line));
    },

    error: (message, error, context) => {
      const errorContext = {
        ...context,
        error: serializeError(error),
      };
      emit(formatLog('ERROR', message, errorContext), (line) => console.error(line));
    },

    debug: (message, context) => {
      if (debugEnabled) {
        emit(formatLog('DEBUG', message, context), (line) => console.debug(line));
      }
    },
  };
}

export const logger: Logger = createLogger({ logFile: config.logFile, level: config.logLevel });
