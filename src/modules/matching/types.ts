/**
 * Shared types for the medication matching core.
 *
 * Everything here is plain data: records come from a store the caller owns,
 * signals come from whatever recognizer/decoder/classifier produced them.
 */

export const PILL_COLORS = [
  'white', 'yellow', 'orange', 'red', 'pink',
  'blue', 'green', 'purple', 'brown', 'gray', 'black',
  'multicolor',
] as const;

export const PILL_SHAPES = [
  'round', 'oval', 'capsule', 'oblong', 'rectangle',
  'triangle', 'diamond', 'pentagon', 'hexagon', 'octagon',
  'other',
] as const;

export type PillColor = (typeof PILL_COLORS)[number];
export type PillShape = (typeof PILL_SHAPES)[number];

export interface MedicationMetadata {
  genericName?: string;
  brandNames?: readonly string[];
  activeIngredient?: string;
  /** Free-form strength, e.g. "500mg" or "1000 IU" */
  dosageAmount?: string;
  pillColor?: PillColor;
  pillShape?: PillShape;
  /** Drug code / barcode payload, matched by exact equality */
  externalCode?: string;
  notes?: string;
}

export interface MedicationRecord {
  id: string;
  name: string;
  metadata?: MedicationMetadata | null;
}

/** Normalized region of the source image; carried through but never read here. */
export interface BoundingRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RecognizedText {
  text: string;
  confidence?: number;
  region?: BoundingRegion;
}

/**
 * Structured output of a language-model pass over the recognized text.
 * Any field may be missing when the model could not infer it.
 */
export interface MedicationAnalysis {
  name?: string;
  genericName?: string;
  brandNames?: readonly string[];
  dosageAmount?: string;
  activeIngredient?: string;
}

export interface QuerySignals {
  recognizedText?: readonly RecognizedText[];
  labels?: readonly string[];
  color?: PillColor;
  shape?: PillShape;
  externalCode?: string;
  aiTerms?: readonly string[];
  aiAnalysis?: MedicationAnalysis;
}

export interface ScoredCandidate<T extends MedicationRecord = MedicationRecord> {
  record: T;
  score: number;
  /** Position in the input candidate set; tie-break key */
  index: number;
}
