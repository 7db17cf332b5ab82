import { describe, expect, it } from 'vitest';
import { cosineSimilarity } from './similarity.js';

describe('cosineSimilarity', () => {
  it('is 1 for a vector and itself', () => {
    const v = [0.3, -1.2, 4, 0.01];
    expect(cosineSimilarity(v, v)).toBeCloseTo(1, 12);
  });

  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it('is 0 for orthogonal and -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 12);
  });

  it('is 0 when either vector is all zeros', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });

  it('rejects vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector length mismatch: 2 vs 3');
  });

  it('rejects empty vectors', () => {
    expect(() => cosineSimilarity([], [])).toThrow('Cannot compute similarity of empty vectors');
  });
});
