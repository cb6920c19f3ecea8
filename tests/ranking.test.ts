import { describe, it, expect } from 'vitest';
import { rankCandidates, type RankingOptions } from '../src/modules/matching/ranking.js';
import { InputValidationError } from '../src/modules/matching/validation.js';
import { acetaminophen, aspirin, ibuprofen, numbered, rec } from './fixtures/records.js';

const defaults: RankingOptions = { minRelevance: 0.1, maxResults: 10, maxEditDistance: 2 };

describe('rankCandidates', () => {
  it('should keep only relevant candidates', () => {
    const results = rankCandidates([aspirin, ibuprofen, acetaminophen], ['aspirin'], defaults);
    expect(results).toEqual([{ record: aspirin, score: 1.0, index: 0 }]);
  });

  it('should sort by score descending', () => {
    const candidates = [
      rec('typo', 'Asprin'),
      rec('plus', 'Aspirin Plus'),
      rec('exact', 'Aspirin'),
    ];
    const results = rankCandidates(candidates, ['aspirin'], defaults);
    expect(results.map(r => r.record.id)).toEqual(['exact', 'plus', 'typo']);
    expect(results.map(r => r.score)).toEqual([1.0, 0.5, 0.3]);
  });

  it('should keep input order for equal scores', () => {
    const a = rec('a', 'Advil');
    const b = rec('b', 'Tylenol');
    const c = rec('c', 'Advil');

    expect(rankCandidates([a, b, c], ['advil'], defaults).map(r => r.record.id)).toEqual(['a', 'c']);
    expect(rankCandidates([c, b, a], ['advil'], defaults).map(r => r.record.id)).toEqual(['c', 'a']);
  });

  it('should record each candidate input index', () => {
    const results = rankCandidates([acetaminophen, ibuprofen], ['advil'], defaults);
    expect(results).toEqual([{ record: ibuprofen, score: 1.0, index: 1 }]);
  });

  it('should truncate to maxResults, keeping input order among ties', () => {
    const results = rankCandidates(numbered(20), ['medication'], defaults);
    expect(results).toHaveLength(10);
    expect(results.map(r => r.record.id)).toEqual(
      Array.from({ length: 10 }, (_, i) => `med-${i + 1}`)
    );
  });

  it('should respect a custom maxResults', () => {
    expect(rankCandidates(numbered(20), ['medication'], { ...defaults, maxResults: 3 })).toHaveLength(3);
  });

  it('should exclude a score exactly at the default threshold', () => {
    const noise = Array.from({ length: 9 }, (_, i) => `zzzz${i + 1}`);
    expect(rankCandidates([rec('1', 'Aspirin')], ['aspirin', ...noise], defaults)).toEqual([]);
  });

  it('should include a score just above the default threshold', () => {
    const noise = Array.from({ length: 8 }, (_, i) => `zzzz${i + 1}`);
    const results = rankCandidates([rec('1', 'Aspirin')], ['aspirin', ...noise], defaults);
    expect(results).toHaveLength(1);
    expect(results[0].score).toBeCloseTo(1 / 9, 10);
  });

  it('should exclude a score exactly at a custom threshold', () => {
    const results = rankCandidates(
      [rec('plus', 'Aspirin Plus'), rec('exact', 'Aspirin')],
      ['aspirin'],
      { ...defaults, minRelevance: 0.5 }
    );
    expect(results.map(r => r.record.id)).toEqual(['exact']);
  });

  it('should return an empty list for no candidates', () => {
    expect(rankCandidates([], ['aspirin'], defaults)).toEqual([]);
  });

  it('should return an empty list for no query terms', () => {
    expect(rankCandidates([aspirin, ibuprofen], [], defaults)).toEqual([]);
  });

  it('should reject a candidate with a blank name', () => {
    const candidates = [rec('x', '   '), rec('a', 'Aspirin')];
    expect(() => rankCandidates(candidates, ['zyrtec'], defaults)).toThrow(InputValidationError);
  });

  it('should reject duplicate candidate ids', () => {
    const candidates = [rec('a', 'Aspirin'), rec('a', 'Advil')];
    expect(() => rankCandidates(candidates, ['advil'], defaults)).toThrow('Invalid candidate set');
  });
});
