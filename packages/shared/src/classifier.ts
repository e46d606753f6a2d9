/**
 * Line Classifier
 *
 * Decides whether one extracted text line is noise or a voter record.
 * Unparseable lines are expected in real reports (repeated headers,
 * footers, wrapped text) and are skipped silently.
 */

import type { LineClassification } from './types';
import type { FormatMatcher } from './matchers/types';
import {
  getMatchers,
  getRejectionPatterns,
  GLOBAL_REJECTION_PATTERNS,
  tryMatch,
} from './matchers';
import { config } from './config';

export interface ClassifierOptions {
  /** Minimum trimmed length of a candidate record line */
  minLineLength?: number;
  /** Matchers to try, in priority order. Defaults to the registry. */
  matchers?: readonly FormatMatcher[];
}

function rejectionPatternsFor(matchers: readonly FormatMatcher[] | undefined): readonly RegExp[] {
  if (!matchers) return getRejectionPatterns();
  return [...GLOBAL_REJECTION_PATTERNS, ...matchers.flatMap((m) => m.rejectionPatterns)];
}

/**
 * Build a classifier bound to a fixed matcher set, so per-line calls do
 * not rebuild the rejection list.
 */
export function createLineClassifier(
  options: ClassifierOptions = {}
): (line: string) => LineClassification {
  const minLineLength = options.minLineLength ?? config.minLineLength;
  const matchers = options.matchers ?? getMatchers();
  const rejectionPatterns = rejectionPatternsFor(options.matchers);

  return (line: string): LineClassification => {
    const text = line.trim();
    if (text.length < minLineLength) {
      return { kind: 'skip', reason: 'too_short' };
    }

    if (rejectionPatterns.some((pattern) => pattern.test(text))) {
      return { kind: 'skip', reason: 'rejected' };
    }

    for (const matcher of matchers) {
      const record = tryMatch(matcher, text);
      if (record) {
        return { kind: 'parsed', record };
      }
    }

    return { kind: 'skip', reason: 'unmatched' };
  };
}

/**
 * Classify a single line against the registered matchers.
 */
export function classifyLine(line: string, options: ClassifierOptions = {}): LineClassification {
  return createLineClassifier(options)(line);
}
