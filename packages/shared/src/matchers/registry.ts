/**
 * Matcher Registry
 *
 * Ordered registry of format matchers. Lines are tried against matchers in
 * registration order and the first match wins, so a new layout is added by
 * appending a matcher, never by editing an existing one.
 */

import type { LayoutId } from '../types';
import type { FormatMatcher } from './types';
import { GLOBAL_REJECTION_PATTERNS } from './patterns';
import { logger } from '../logger';

const matcherRegistry: FormatMatcher[] = [];

let rejectionCache: readonly RegExp[] | null = null;

/**
 * Append a matcher to the end of the priority order.
 *
 * @throws Error if a matcher for the same layout is already registered
 */
export function registerMatcher(matcher: FormatMatcher): void {
  if (matcherRegistry.some((m) => m.layout === matcher.layout)) {
    throw new Error(`Matcher already registered for layout: ${matcher.layout}`);
  }
  matcherRegistry.push(matcher);
  rejectionCache = null;

  logger.debug('Registered matcher', {
    layout: matcher.layout,
    priority: matcherRegistry.length,
    description: matcher.description,
  });
}

/**
 * Registered matchers in priority order.
 */
export function getMatchers(): readonly FormatMatcher[] {
  return matcherRegistry;
}

export function getMatcher(layout: LayoutId): FormatMatcher | undefined {
  return matcherRegistry.find((m) => m.layout === layout);
}

export function getMatcherOrThrow(layout: LayoutId): FormatMatcher {
  const matcher = getMatcher(layout);
  if (!matcher) {
    throw new Error(`No matcher registered for layout: ${layout}`);
  }
  return matcher;
}

export function getRegisteredLayouts(): LayoutId[] {
  return matcherRegistry.map((m) => m.layout);
}

/**
 * Global rejection patterns followed by every registered matcher's own.
 */
export function getRejectionPatterns(): readonly RegExp[] {
  if (!rejectionCache) {
    rejectionCache = [
      ...GLOBAL_REJECTION_PATTERNS,
      ...matcherRegistry.flatMap((m) => m.rejectionPatterns),
    ];
  }
  return rejectionCache;
}
