import type { MedicationRecord } from './types.js';

/**
 * Find the record whose external code (NDC or other barcode payload) equals
 * the scanned one. Exact string comparison; the first hit in candidate order
 * wins. Returns null for an empty code or no hit.
 */
export function findByExternalCode<T extends MedicationRecord>(
  candidates: readonly T[],
  code: string | undefined
): T | null {
  if (!code) return null;
  return candidates.find(c => c.metadata?.externalCode === code) ?? null;
}
