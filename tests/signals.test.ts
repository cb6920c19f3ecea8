import { describe, it, expect } from 'vitest';
import {
  aggregateSignals,
  analysisTerms,
  extractDosage,
  looksLikeMedicationName,
} from '../src/modules/matching/signals.js';

describe('extractDosage', () => {
  it('should extract a milligram dosage', () => {
    expect(extractDosage('Aspirin 500mg')).toBe('500mg');
  });

  it('should allow a space before the unit', () => {
    expect(extractDosage('Vitamin D3 1000 IU')).toBe('1000 IU');
    expect(extractDosage('10 ml syrup')).toBe('10 ml');
  });

  it('should be case-insensitive', () => {
    expect(extractDosage('IBUPROFEN 200MG')).toBe('200MG');
  });

  it('should return null without a unit', () => {
    expect(extractDosage('Take 2 tablets')).toBeNull();
  });
});

describe('looksLikeMedicationName', () => {
  it('should accept a capitalized name', () => {
    expect(looksLikeMedicationName('Aspirin')).toBe(true);
    expect(looksLikeMedicationName('Aspirin 81mg')).toBe(true);
  });

  it('should reject text without a capital letter', () => {
    expect(looksLikeMedicationName('500mg 100 tablets')).toBe(false);
  });

  it('should reject text with more digits than letters', () => {
    expect(looksLikeMedicationName('B12')).toBe(false);
  });

  it('should reject more than three words', () => {
    expect(looksLikeMedicationName('Take One Tablet Daily')).toBe(false);
  });
});

describe('analysisTerms', () => {
  it('should flatten every present field in order', () => {
    expect(analysisTerms({
      name: 'Aspirin',
      genericName: 'Acetylsalicylic Acid',
      brandNames: ['Bayer'],
      dosageAmount: '81mg',
      activeIngredient: 'Aspirin',
    })).toEqual(['Aspirin', 'Acetylsalicylic Acid', 'Bayer', '81mg', 'Aspirin']);
  });

  it('should skip missing fields', () => {
    expect(analysisTerms({ dosageAmount: '10mg' })).toEqual(['10mg']);
  });
});

describe('aggregateSignals', () => {
  it('should merge every source into normalized, deduplicated terms', () => {
    const terms = aggregateSignals({
      recognizedText: [
        { text: ' Aspirin ', confidence: 0.9 },
        { text: '500MG', confidence: 0.2 },
      ],
      labels: ['pill', 'Aspirin'],
      aiTerms: ['Bayer'],
      color: 'white',
      shape: 'round',
    });
    expect(terms).toEqual(['aspirin', '500mg', 'pill', 'bayer', 'white', 'round']);
  });

  it('should keep low-confidence text', () => {
    expect(aggregateSignals({ recognizedText: [{ text: 'Advil', confidence: 0 }] })).toEqual(['advil']);
  });

  it('should flatten an AI analysis', () => {
    const terms = aggregateSignals({
      aiAnalysis: {
        name: 'Aspirin',
        genericName: 'Acetylsalicylic Acid',
        brandNames: ['Bayer'],
        dosageAmount: '81mg',
        activeIngredient: 'Aspirin',
      },
    });
    expect(terms).toEqual(['aspirin', 'acetylsalicylic acid', 'bayer', '81mg']);
  });

  it('should drop blank terms', () => {
    expect(aggregateSignals({ labels: ['  ', ''], recognizedText: [{ text: '\n' }] })).toEqual([]);
  });

  it('should return an empty list for empty signals', () => {
    expect(aggregateSignals({})).toEqual([]);
  });

  it('should ignore the external code', () => {
    expect(aggregateSignals({ externalCode: '12345-678-90' })).toEqual([]);
  });

  it('should keep only name-like lines and dosages in structured mode', () => {
    const terms = aggregateSignals(
      {
        recognizedText: [
          { text: 'Aspirin' },
          { text: '500mg 100 tablets' },
          { text: 'Aspirin 81mg' },
        ],
      },
      { textMode: 'structured' }
    );
    expect(terms).toEqual(['aspirin', 'aspirin 81mg', '500mg', '81mg']);
  });
});
