import { normalizeTerms } from './terms.js';
import type { MedicationAnalysis, QuerySignals, RecognizedText } from './types.js';

/**
 * How recognized text lines become query terms.
 *
 * raw:        every line as-is
 * structured: lines that look like a medication name, plus any dosage
 *             ("500mg", "10 ml") found in any line
 */
export type TextMode = 'raw' | 'structured';

export interface AggregationOptions {
  textMode: TextMode;
}

const DOSAGE_PATTERN = /\d+\s?(mg|mcg|g|ml|IU|units?)/i;

/**
 * Extract the first dosage in a line of text, e.g. "Aspirin 500mg" -> "500mg".
 */
export function extractDosage(text: string): string | null {
  const match = text.match(DOSAGE_PATTERN);
  return match ? match[0] : null;
}

/**
 * Heuristic: short text with a capital letter that is more letters than
 * digits. "Aspirin" passes, "500mg 100 tablets" does not.
 */
export function looksLikeMedicationName(text: string): boolean {
  const words = text.split(/\s/);
  const hasCapital = /\p{Lu}/u.test(text);
  const letters = text.match(/\p{L}/gu)?.length ?? 0;
  const digits = text.match(/\p{N}/gu)?.length ?? 0;

  return hasCapital && letters > digits && words.length <= 3;
}

/**
 * Flatten a structured AI analysis into plain terms.
 */
export function analysisTerms(analysis: MedicationAnalysis): string[] {
  const terms: string[] = [];
  if (analysis.name) terms.push(analysis.name);
  if (analysis.genericName) terms.push(analysis.genericName);
  if (analysis.brandNames) terms.push(...analysis.brandNames);
  if (analysis.dosageAmount) terms.push(analysis.dosageAmount);
  if (analysis.activeIngredient) terms.push(analysis.activeIngredient);
  return terms;
}

function textTerms(lines: readonly RecognizedText[], mode: TextMode): string[] {
  if (mode === 'raw') return lines.map(l => l.text);

  const names = lines.filter(l => looksLikeMedicationName(l.text)).map(l => l.text);
  const dosages = lines
    .map(l => extractDosage(l.text))
    .filter((d): d is string => d !== null);

  return [...names, ...dosages];
}

/**
 * Merge every signal source into one deduplicated list of normalized terms.
 *
 * Order: recognized text, labels, AI terms, AI analysis, color, shape.
 * The first occurrence of a term keeps its place; blank terms are dropped.
 * Confidence is not looked at.
 */
export function aggregateSignals(
  signals: QuerySignals,
  options: AggregationOptions = { textMode: 'raw' }
): string[] {
  const raw = [
    ...textTerms(signals.recognizedText ?? [], options.textMode),
    ...(signals.labels ?? []),
    ...(signals.aiTerms ?? []),
    ...(signals.aiAnalysis ? analysisTerms(signals.aiAnalysis) : []),
  ];
  if (signals.color) raw.push(signals.color);
  if (signals.shape) raw.push(signals.shape);

  return normalizeTerms(raw);
}
