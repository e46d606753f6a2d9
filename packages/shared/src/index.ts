/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  newCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export {
  logger,
  createLogger,
  formatLog,
  serializeError,
  type Logger,
  type LoggerOptions,
  type LogContext,
} from './logger';

// Config
export { config, loadConfig, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  ConversionError,
  DocumentNotFoundError,
  DocumentReadError,
  OutputWriteError,
  isConversionError,
  type ConversionErrorCode,
} from './errors';

// Metrics
export {
  register,
  documentsConvertedCounter,
  conversionDurationHistogram,
  pagesFailedCounter,
  recordsParsedCounter,
  linesSkippedCounter,
  duplicatesRemovedCounter,
  getMetrics,
  writeMetricsFile,
} from './metrics';

// Schemas
export {
  validateRecord,
  validateBatchSummary,
  recordSchemaFor,
  type ValidationResult,
} from './schemas';

// Format matchers (ordered layout rules)
export {
  type FormatMatcher,
  tryMatch,
  defineMatcher,
  registerMatcher,
  getMatchers,
  getMatcher,
  getMatcherOrThrow,
  getRegisteredLayouts,
  getRejectionPatterns,
  registerAllMatchers,
  GLOBAL_REJECTION_PATTERNS,
  ROW_NUMBER,
  STATE_ID,
  PRECINCT_NUMBER,
  ELECTION_DATE,
  CHECKIN_PRECINCT,
  groupName,
  checkinMatcher,
  checkinPollingPlaceMatcher,
  mailedBallotMatcher,
  personalAppearanceMatcher,
} from './matchers';

// Pipeline
export { classifyLine, createLineClassifier, type ClassifierOptions } from './classifier';
export type { TextSource, TextDocument } from './text-source';
export {
  aggregateDocument,
  type AggregateOptions,
  type AggregateResult,
  type ProgressEvent,
} from './aggregator';
export { deduplicateRecords, type DeduplicationResult } from './dedup';
export { csvQuote, resolveColumns, serializeCsv, writeCsv } from './csv';
export { convertDocument, defaultOutputPath, type ConvertOptions } from './converter';
