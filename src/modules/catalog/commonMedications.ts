/**
 * Reference list of common over-the-counter and prescription medications,
 * used for autocomplete when a user adds a record by hand.
 */

export type MedicationCategory =
  | 'Pain Relief'
  | 'Antibiotic'
  | 'Vitamin'
  | 'Heart Health'
  | 'Diabetes'
  | 'Mental Health'
  | 'Allergy'
  | 'Other';

export interface CommonMedication {
  name: string;
  genericName: string | null;
  brandNames: string[];
  activeIngredient: string;
  commonDosages: string[];
  category: MedicationCategory;
}

export const COMMON_MEDICATIONS: readonly CommonMedication[] = [
  // Pain relief
  {
    name: 'Aspirin',
    genericName: 'Acetylsalicylic Acid',
    brandNames: ['Bayer', 'Bufferin', 'Ecotrin'],
    activeIngredient: 'Aspirin',
    commonDosages: ['81mg', '325mg', '500mg'],
    category: 'Pain Relief',
  },
  {
    name: 'Ibuprofen',
    genericName: null,
    brandNames: ['Advil', 'Motrin', 'Nurofen'],
    activeIngredient: 'Ibuprofen',
    commonDosages: ['200mg', '400mg', '600mg', '800mg'],
    category: 'Pain Relief',
  },
  {
    name: 'Acetaminophen',
    genericName: null,
    brandNames: ['Tylenol', 'Paracetamol'],
    activeIngredient: 'Acetaminophen',
    commonDosages: ['325mg', '500mg', '650mg'],
    category: 'Pain Relief',
  },

  // Vitamins
  {
    name: 'Vitamin D',
    genericName: 'Cholecalciferol',
    brandNames: ['Vitamin D3'],
    activeIngredient: 'Vitamin D3',
    commonDosages: ['1000 IU', '2000 IU', '5000 IU'],
    category: 'Vitamin',
  },
  {
    name: 'Multivitamin',
    genericName: null,
    brandNames: ['Centrum', 'One A Day', 'Nature Made'],
    activeIngredient: 'Mixed vitamins',
    commonDosages: ['Daily'],
    category: 'Vitamin',
  },
  {
    name: 'Fish Oil',
    genericName: 'Omega-3 Fatty Acids',
    brandNames: ['Nordic Naturals', 'Nature Made'],
    activeIngredient: 'EPA/DHA',
    commonDosages: ['1000mg', '1200mg'],
    category: 'Vitamin',
  },

  // Antibiotics
  {
    name: 'Amoxicillin',
    genericName: null,
    brandNames: ['Amoxil', 'Moxatag'],
    activeIngredient: 'Amoxicillin',
    commonDosages: ['250mg', '500mg', '875mg'],
    category: 'Antibiotic',
  },

  // Allergy
  {
    name: 'Cetirizine',
    genericName: null,
    brandNames: ['Zyrtec', 'Alleroff'],
    activeIngredient: 'Cetirizine',
    commonDosages: ['5mg', '10mg'],
    category: 'Allergy',
  },
  {
    name: 'Loratadine',
    genericName: null,
    brandNames: ['Claritin', 'Alavert'],
    activeIngredient: 'Loratadine',
    commonDosages: ['10mg'],
    category: 'Allergy',
  },
];

/**
 * First medication whose name, generic name, brand or active ingredient
 * contains the term (case-insensitive).
 */
export function findCommonMedication(
  term: string,
  catalog: readonly CommonMedication[] = COMMON_MEDICATIONS
): CommonMedication | null {
  const needle = term.trim().toLowerCase();
  if (!needle) return null;

  return catalog.find(m =>
    m.name.toLowerCase().includes(needle) ||
    (m.genericName?.toLowerCase().includes(needle) ?? false) ||
    m.brandNames.some(b => b.toLowerCase().includes(needle)) ||
    m.activeIngredient.toLowerCase().includes(needle)
  ) ?? null;
}

/**
 * Medications whose name, generic name or a brand starts with the prefix.
 */
export function suggestCommonMedications(
  prefix: string,
  limit = 5,
  catalog: readonly CommonMedication[] = COMMON_MEDICATIONS
): CommonMedication[] {
  const needle = prefix.trim().toLowerCase();
  if (!needle) return [];

  return catalog
    .filter(m =>
      m.name.toLowerCase().startsWith(needle) ||
      (m.genericName?.toLowerCase().startsWith(needle) ?? false) ||
      m.brandNames.some(b => b.toLowerCase().startsWith(needle))
    )
    .slice(0, limit);
}
