import type { MedicationRecord } from './types.js';

/**
 * Normalize a term for comparison: trim surrounding whitespace, lowercase.
 * Every comparison in the pipeline goes through this.
 */
export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase();
}

/**
 * Normalize a list of terms, dropping blanks and keeping the first
 * occurrence of each.
 */
export function normalizeTerms(terms: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const term of terms) {
    const normalized = normalizeTerm(term);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

/**
 * All searchable terms for a record.
 *
 * The display name comes first. Fields that are absent or blank contribute
 * nothing, so an empty string never reaches the partial tier. Notes and the
 * external code are not search terms.
 */
export function searchableTerms(record: MedicationRecord): Set<string> {
  const terms = new Set<string>();
  const add = (value: string | undefined) => {
    if (value === undefined) return;
    const normalized = normalizeTerm(value);
    if (normalized) terms.add(normalized);
  };

  add(record.name);

  const metadata = record.metadata;
  if (!metadata) return terms;

  add(metadata.genericName);
  for (const brand of metadata.brandNames ?? []) add(brand);
  add(metadata.activeIngredient);
  add(metadata.dosageAmount);
  add(metadata.pillColor);
  add(metadata.pillShape);

  return terms;
}
