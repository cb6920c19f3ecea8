export {
  identify,
  identifyScored,
  score,
  DEFAULT_IDENTIFY_OPTIONS,
  type IdentifyOptions,
  type IdentifyResult,
  type MatchSource,
} from './modules/matching/identify.js';
export { editDistance } from './modules/matching/editDistance.js';
export { normalizeTerm, normalizeTerms, searchableTerms } from './modules/matching/terms.js';
export {
  matchTier,
  relevanceScore,
  TIER_WEIGHTS,
  DEFAULT_MAX_EDIT_DISTANCE,
  type MatchTier,
  type ScoringOptions,
} from './modules/matching/scoring.js';
export {
  rankCandidates,
  DEFAULT_MIN_RELEVANCE,
  DEFAULT_MAX_RESULTS,
  type RankingOptions,
} from './modules/matching/ranking.js';
export { findByExternalCode } from './modules/matching/barcode.js';
export {
  aggregateSignals,
  analysisTerms,
  extractDosage,
  looksLikeMedicationName,
  type AggregationOptions,
  type TextMode,
} from './modules/matching/signals.js';
export {
  medicationRecordSchema,
  medicationMetadataSchema,
  querySignalsSchema,
  identifyOptionsSchema,
} from './modules/matching/schemas.js';
export { InputValidationError, type ValidationDetails } from './modules/matching/validation.js';
export {
  PILL_COLORS,
  PILL_SHAPES,
  type PillColor,
  type PillShape,
  type MedicationMetadata,
  type MedicationRecord,
  type MedicationAnalysis,
  type QuerySignals,
  type RecognizedText,
  type BoundingRegion,
  type ScoredCandidate,
} from './modules/matching/types.js';
