import { candidateSetSchema } from './schemas.js';
import { relevanceScore, type ScoringOptions } from './scoring.js';
import { searchableTerms } from './terms.js';
import type { MedicationRecord, ScoredCandidate } from './types.js';
import { assertValid } from './validation.js';

export const DEFAULT_MIN_RELEVANCE = 0.1;
export const DEFAULT_MAX_RESULTS = 10;

export interface RankingOptions extends ScoringOptions {
  /** Candidates must score strictly above this to be kept */
  minRelevance: number;
  maxResults: number;
}

/**
 * Score every candidate against the query, keep those above minRelevance,
 * and return the best maxResults sorted by score desc.
 *
 * Equal scores keep their input order: the input index is captured before
 * sorting and used as the tie-break key.
 *
 * Throws InputValidationError for an invalid candidate set (blank name,
 * duplicate id).
 */
export function rankCandidates<T extends MedicationRecord>(
  candidates: readonly T[],
  queryTerms: readonly string[],
  options: RankingOptions
): ScoredCandidate<T>[] {
  assertValid(candidateSetSchema, candidates, 'candidate set');
  if (candidates.length === 0 || queryTerms.length === 0) return [];

  return candidates
    .map((record, index) => ({
      record,
      index,
      score: relevanceScore(queryTerms, searchableTerms(record), options),
    }))
    .filter(c => c.score > options.minRelevance)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, options.maxResults);
}
