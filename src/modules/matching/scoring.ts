/**
 * Relevance heuristic for medication identification.
 *
 * Calculates a score (0..1) for how well a record's terms match a list of
 * query terms pulled from a photo of a pill, bottle or box.
 */

import { editDistance } from './editDistance.js';

export type MatchTier = 'exact' | 'partial' | 'fuzzy' | 'none';

export const TIER_WEIGHTS: Readonly<Record<MatchTier, number>> = {
  exact: 1.0,
  partial: 0.5,
  fuzzy: 0.3,
  none: 0,
};

export const DEFAULT_MAX_EDIT_DISTANCE = 2;

export interface ScoringOptions {
  /** Largest edit distance that still counts as a fuzzy hit */
  maxEditDistance: number;
}

/**
 * Classify how a single (normalized) query term hits a record's term set.
 *
 * Tiers are checked in order and the first hit wins:
 *   exact:   query equals a term
 *   partial: query contains a term, or a term contains the query
 *   fuzzy:   query is within maxEditDistance edits of some term
 */
export function matchTier(
  query: string,
  terms: ReadonlySet<string>,
  maxEditDistance = DEFAULT_MAX_EDIT_DISTANCE
): MatchTier {
  if (terms.has(query)) return 'exact';

  for (const term of terms) {
    if (term.includes(query) || query.includes(term)) return 'partial';
  }

  for (const term of terms) {
    if (editDistance(query, term) <= maxEditDistance) return 'fuzzy';
  }

  return 'none';
}

/**
 * Calculate relevance of a record for a query term list.
 *
 * Each query term contributes its tier weight (1.0 / 0.5 / 0.3 / 0); the sum
 * is divided by the number of query terms. An empty query scores 0.
 *
 * Both inputs must already be normalized; queryTerms must be deduplicated.
 */
export function relevanceScore(
  queryTerms: readonly string[],
  recordTerms: ReadonlySet<string>,
  options: ScoringOptions = { maxEditDistance: DEFAULT_MAX_EDIT_DISTANCE }
): number {
  if (queryTerms.length === 0) return 0;

  let total = 0;
  for (const query of queryTerms) {
    total += TIER_WEIGHTS[matchTier(query, recordTerms, options.maxEditDistance)];
  }

  return total / queryTerms.length;
}
