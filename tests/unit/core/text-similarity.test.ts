import { describe, it, expect } from 'vitest';
import {
  containsAny,
  countOccurrences,
  extractKeywords,
  findMarkers,
  jaccardSimilarity,
  labelSimilarity,
  tokenize,
} from '../../../src/core/utils/text-similarity.js';

describe('text similarity', () => {
  it('tokenizes into lowercase words', () => {
    expect([...tokenize('Long-term Risk, risk!')]).toEqual(['long', 'term', 'risk']);
  });

  it('computes Jaccard over token sets', () => {
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
    expect(jaccardSimilarity(new Set(), new Set(['a']))).toBe(0);
  });

  describe('labelSimilarity', () => {
    it('scores exact and substring matches at 0.95', () => {
      expect(labelSimilarity(['Risk'], ['risk'])).toBe(0.95);
      expect(labelSimilarity(['financial risk'], ['risk'])).toBe(0.95);
      expect(labelSimilarity(['risk'], ['risk management'])).toBe(0.95);
    });

    it('falls back to the best token Jaccard', () => {
      expect(labelSimilarity(['career growth'], ['growth plan'])).toBeCloseTo(1 / 3);
    });

    it('is zero with nothing in common', () => {
      expect(labelSimilarity(['power'], ['health'])).toBe(0);
    });
  });

  it('extracts distinct keywords of at least four characters', () => {
    expect(extractKeywords('Should I quit my job? I should, I think.')).toEqual([
      'should',
      'quit',
      'think',
    ]);
  });

  describe('marker matching', () => {
    it('matches whole words only', () => {
      expect(containsAny('I am not sure', ['not'])).toBe(true);
      expect(containsAny('nothing to add', ['not'])).toBe(false);
    });

    it('matches phrases across punctuation and hyphens', () => {
      expect(findMarkers('Go all-in, no way back!', ['all-in', 'no way back', 'exit'])).toEqual([
        'all-in',
        'no way back',
      ]);
    });

    it('counts every occurrence', () => {
      expect(countOccurrences('but, but and however but', ['but', 'however'])).toBe(4);
    });
  });
});
