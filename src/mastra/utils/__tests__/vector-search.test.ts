import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '../vector-search';

describe('cosineSimilarity', () => {
  it('is 1 for parallel and 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns 0 when either vector has zero norm', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('throws on a dimension mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});
