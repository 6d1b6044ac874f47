/**
 * Site Key Strategies
 * How raw records are grouped into one school. One aggregation run uses one
 * strategy; input produced under different strategies must not be mixed.
 */

import { lastPathSegment } from '../../lib/crawling';

export interface SiteKeySource {
  id: string;
  url: string;
}

export interface SiteKeyStrategy {
  readonly name: string;

  /**
   * Grouping key, or null when the record carries none
   */
  deriveKey(record: SiteKeySource): string | null;
}

/**
 * "12-3" -> "12". An id without "-" is its own key.
 */
export const idPrefixStrategy: SiteKeyStrategy = {
  name: 'id-prefix',
  deriveKey(record) {
    const key = record.id.split('-')[0];
    return key ? key : null;
  },
};

/**
 * "https://host/school/ais-tokyo" -> "ais-tokyo"
 */
export const urlPathSegmentStrategy: SiteKeyStrategy = {
  name: 'url-path-segment',
  deriveKey(record) {
    if (!record.url) return null;
    const key = lastPathSegment(record.url);
    return key ? key : null;
  },
};

const STRATEGIES: Record<string, SiteKeyStrategy> = {
  [idPrefixStrategy.name]: idPrefixStrategy,
  [urlPathSegmentStrategy.name]: urlPathSegmentStrategy,
};

export function getSiteKeyStrategy(name: string): SiteKeyStrategy {
  const strategy = STRATEGIES[name];
  if (!strategy) {
    throw new Error(`Unknown site key strategy "${name}". Expected one of: ${Object.keys(STRATEGIES).join(', ')}`);
  }
  return strategy;
}
