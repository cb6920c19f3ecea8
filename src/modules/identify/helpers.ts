import type { IdentifyResult } from '../matching/identify.js';
import { matchTier } from '../matching/scoring.js';
import { normalizeTerms, searchableTerms } from '../matching/terms.js';
import type { MedicationRecord } from '../matching/types.js';
import type { IdentifyResultItem, ScoreResponse } from './schemas.js';

/**
 * Deep link that opens a record in the client app: <scheme>://medication/<id>
 */
export function toDeepLink(recordId: string, scheme: string): string {
  return `${scheme}://medication/${encodeURIComponent(recordId)}`;
}

export function toResultItem(result: IdentifyResult, scheme: string): IdentifyResultItem {
  return {
    id: result.record.id,
    name: result.record.name,
    score: result.score,
    matched_by: result.matchedBy,
    deep_link: toDeepLink(result.record.id, scheme),
  };
}

/**
 * Per-term tier breakdown behind a score, in normalized query order.
 */
export function explainTerms(
  queryTerms: readonly string[],
  record: MedicationRecord,
  maxEditDistance: number
): ScoreResponse['terms'] {
  const recordTerms = searchableTerms(record);
  return normalizeTerms(queryTerms).map(term => ({
    term,
    tier: matchTier(term, recordTerms, maxEditDistance),
  }));
}
