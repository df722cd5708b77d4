import { describe, it, expect } from 'vitest';
import { cosineDistance, euclideanDistance, nameSimilarity, normalizeRelevance } from '../utils/similarity';

describe('normalizeRelevance', () => {
  it('maps distances up to 1 linearly', () => {
    expect(normalizeRelevance(0)).toBe(1);
    expect(normalizeRelevance(0.25)).toBe(0.75);
    expect(normalizeRelevance(1)).toBe(0);
  });

  it('decays distances above 1 as 1/(1+d)', () => {
    expect(normalizeRelevance(3)).toBe(0.25);
    expect(normalizeRelevance(9)).toBeCloseTo(0.1, 10);
  });

  it('is non-increasing within each regime', () => {
    const low = [0, 0.1, 0.5, 0.9, 1].map(normalizeRelevance);
    const high = [1.01, 2, 5, 100].map(normalizeRelevance);
    for (const scores of [low, high]) {
      scores.slice(1).forEach((score, i) => expect(score).toBeLessThanOrEqual(scores[i]));
    }
  });

  it('clamps to [0, 1] and scores non-finite distances as 0', () => {
    expect(normalizeRelevance(-0.5)).toBe(1);
    expect(normalizeRelevance(Number.NaN)).toBe(0);
    expect(normalizeRelevance(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('distances', () => {
  it('computes cosine distance', () => {
    expect(cosineDistance([1, 0], [1, 0])).toBeCloseTo(0, 10);
    expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1, 10);
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(2, 10);
  });

  it('computes euclidean distance', () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });
});

describe('nameSimilarity', () => {
  it('ignores case and separators', () => {
    expect(nameSimilarity('FireRating', 'fire_rating')).toBe(1);
    expect(nameSimilarity('Width', '')).toBe(0);
  });
});
