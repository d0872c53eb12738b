import * as fuzz from 'fuzzball';
import type { SicClassification, SicMatch } from '@sicmatch/types';
import type { SicCatalog } from './catalog.js';
import { extractActivityCategories, extractBusinessActivity } from './extract-activity.js';

export const DEFAULT_MATCH_LIMIT = 3;

export type MatchOptions = {
  /** Maximum number of results (default 3; Infinity for all). */
  limit?: number;
  /** Drop results scoring below this. No floor by default. */
  minScore?: number;
};

/** Weighted-ratio similarity, 0-100. Tolerates reordered tokens and partial overlap. */
export function scoreSimilarity(query: string, description: string): number {
  return fuzz.WRatio(query, description);
}

/**
 * Rank catalog entries by similarity to `query`, best first.
 * Entries are scored independently, so equal descriptions under different codes
 * all appear; ties keep catalog order.
 */
export function matchCatalog(
  query: unknown,
  catalog: Pick<SicCatalog, 'entries'>,
  options: MatchOptions = {}
): SicMatch[] {
  const { entries } = catalog;
  const requested = options.limit ?? DEFAULT_MATCH_LIMIT;
  // Infinity means every entry.
  const limit = requested === Infinity ? entries.length : Math.floor(requested);
  if (!entries.length || Number.isNaN(limit) || limit <= 0) return [];

  const text = typeof query === 'string' ? query : '';
  const scored = entries.map((e) => ({
    code: e.code,
    description: e.description,
    score: scoreSimilarity(text, e.description),
  }));

  // Array#sort is stable: equal scores stay in catalog order.
  scored.sort((a, b) => b.score - a.score);

  const { minScore } = options;
  const kept = minScore === undefined ? scored : scored.filter((m) => m.score >= minScore);
  return kept.slice(0, limit);
}

export interface SicMatcher {
  readonly catalog: SicCatalog;
  /** Rank the catalog against an already-extracted activity phrase. */
  match(query: string, options?: MatchOptions): SicMatch[];
  /** Extract the business activity from a description, then rank the catalog against it. */
  classify(description: unknown, options?: MatchOptions): SicClassification;
}

export function createSicMatcher(catalog: SicCatalog): SicMatcher {
  return {
    catalog,
    match: (query, options) => matchCatalog(query, catalog, options),
    classify(description, options) {
      const extracted = extractBusinessActivity(description);
      return {
        description: typeof description === 'string' ? description : '',
        extracted,
        categories: extractActivityCategories(description),
        classifiable: extracted.length > 0,
        matches: matchCatalog(extracted, catalog, options),
      };
    },
  };
}
