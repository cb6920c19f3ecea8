/**
 * Medication identification pipeline.
 *
 *   signals ──► barcode shortcut ──hit──► [record @ 1.0]
 *                     │
 *                    miss
 *                     ▼
 *               aggregate terms ──► score each candidate ──► rank ──► top N
 *
 * Pure and synchronous: nothing here keeps state between calls.
 */

import { findByExternalCode } from './barcode.js';
import { DEFAULT_MAX_RESULTS, DEFAULT_MIN_RELEVANCE, rankCandidates } from './ranking.js';
import {
  candidateSetSchema,
  identifyOptionsSchema,
  medicationRecordSchema,
  queryTermsSchema,
  querySignalsSchema,
} from './schemas.js';
import { DEFAULT_MAX_EDIT_DISTANCE, relevanceScore } from './scoring.js';
import { aggregateSignals, type TextMode } from './signals.js';
import { normalizeTerms, searchableTerms } from './terms.js';
import type { MedicationRecord, QuerySignals } from './types.js';
import { assertValid } from './validation.js';

export interface IdentifyOptions {
  minRelevance: number;
  maxResults: number;
  maxEditDistance: number;
  textMode: TextMode;
}

export const DEFAULT_IDENTIFY_OPTIONS: Readonly<IdentifyOptions> = {
  minRelevance: DEFAULT_MIN_RELEVANCE,
  maxResults: DEFAULT_MAX_RESULTS,
  maxEditDistance: DEFAULT_MAX_EDIT_DISTANCE,
  textMode: 'raw',
};

export type MatchSource = 'external-code' | 'relevance';

export interface IdentifyResult<T extends MedicationRecord = MedicationRecord> {
  record: T;
  score: number;
  matchedBy: MatchSource;
}

function resolveOptions(options: Partial<IdentifyOptions> | undefined): IdentifyOptions {
  const overrides = assertValid(identifyOptionsSchema, options ?? {}, 'identify options');
  return {
    minRelevance: overrides.minRelevance ?? DEFAULT_IDENTIFY_OPTIONS.minRelevance,
    maxResults: overrides.maxResults ?? DEFAULT_IDENTIFY_OPTIONS.maxResults,
    maxEditDistance: overrides.maxEditDistance ?? DEFAULT_IDENTIFY_OPTIONS.maxEditDistance,
    textMode: overrides.textMode ?? DEFAULT_IDENTIFY_OPTIONS.textMode,
  };
}

/**
 * Run the full pipeline and keep the scores.
 *
 * Returned records are the caller's own objects, in ranked order.
 */
export function identifyScored<T extends MedicationRecord>(
  signals: QuerySignals,
  candidates: readonly T[],
  options?: Partial<IdentifyOptions>
): IdentifyResult<T>[] {
  assertValid(querySignalsSchema, signals, 'query signals');
  assertValid(candidateSetSchema, candidates, 'candidate set');
  const resolved = resolveOptions(options);

  const barcodeHit = findByExternalCode(candidates, signals.externalCode);
  if (barcodeHit) {
    return [{ record: barcodeHit, score: 1.0, matchedBy: 'external-code' }];
  }

  const queryTerms = aggregateSignals(signals, { textMode: resolved.textMode });

  return rankCandidates(candidates, queryTerms, resolved).map((c): IdentifyResult<T> => ({
    record: c.record,
    score: c.score,
    matchedBy: 'relevance',
  }));
}

/**
 * Identify a medication from visual signals.
 * Returns at most maxResults records, best match first.
 */
export function identify<T extends MedicationRecord>(
  signals: QuerySignals,
  candidates: readonly T[],
  options?: Partial<IdentifyOptions>
): T[] {
  return identifyScored(signals, candidates, options).map(r => r.record);
}

/**
 * Raw relevance of one record for a set of query terms.
 *
 * Terms are normalized and deduplicated first, so {"Aspirin", "aspirin "}
 * counts as a single term.
 */
export function score(
  queryTerms: ReadonlySet<string> | readonly string[],
  record: MedicationRecord,
  options?: Partial<Pick<IdentifyOptions, 'maxEditDistance'>>
): number {
  const terms = assertValid(queryTermsSchema, Array.from(queryTerms), 'query terms');
  assertValid(medicationRecordSchema, record, 'record');
  const { maxEditDistance } = resolveOptions(options);

  return relevanceScore(normalizeTerms(terms), searchableTerms(record), { maxEditDistance });
}
