/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Logging
  logFile: string;
  logLevel: string;

  // Classification
  minLineLength: number;

  // Aggregation
  progressInterval: number;

  // Output
  outputSuffix: string;
  naturalKey: string;
  summaryFile: string;
  metricsFile: string;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    // Logging
    logFile: env.LOG_FILE ?? 'pdf_to_csv.log',
    logLevel: env.LOG_LEVEL || 'info',

    // Classification
    minLineLength: parsePositiveInt(env.MIN_LINE_LENGTH, 20),

    // Aggregation
    progressInterval: parsePositiveInt(env.PROGRESS_INTERVAL, 10),

    // Output
    outputSuffix: env.OUTPUT_SUFFIX ?? '_converted',
    naturalKey: env.NATURAL_KEY || 'State ID',
    summaryFile: env.SUMMARY_FILE || '',
    metricsFile: env.METRICS_FILE || '',
  };
}

export const config: Config = loadConfig();
