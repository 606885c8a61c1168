import { describe, it, expect } from 'vitest';
import { DEFAULT_RRF_K, reciprocalRankFusion } from '../rank-fusion';

describe('reciprocalRankFusion', () => {
  it('sums 1 / (k + rank) across lists', () => {
    const fused = reciprocalRankFusion([[1, 2, 3], [3, 4]], 10);

    expect(fused.map((hit) => hit.id)).toEqual([3, 1, 2, 4]);
    expect(fused[0].score).toBe(1 / 63 + 1 / 61);
    expect(fused[1].score).toBe(1 / 61);
    expect(fused[2].score).toBe(1 / 62);
    expect(fused[3].score).toBe(1 / 62);
  });

  it('defaults k to 60', () => {
    expect(DEFAULT_RRF_K).toBe(60);
    expect(reciprocalRankFusion([['a']], 1)).toEqual([{ id: 'a', score: 1 / 61 }]);
  });

  it('uses the provided k', () => {
    expect(reciprocalRankFusion([['a'], ['a']], 1, 1)).toEqual([{ id: 'a', score: 1 }]);
  });

  it('breaks ties by first appearance', () => {
    const fused = reciprocalRankFusion([['x', 'y'], ['y', 'x']], 2);

    expect(fused.map((hit) => hit.id)).toEqual(['x', 'y']);
    expect(fused[0].score).toBe(fused[1].score);
  });

  it('returns at most topK entries', () => {
    expect(reciprocalRankFusion([[1, 2, 3, 4]], 2).map((hit) => hit.id)).toEqual([1, 2]);
    expect(reciprocalRankFusion([[1, 2]], 0)).toEqual([]);
  });

  it('handles empty input lists', () => {
    expect(reciprocalRankFusion([], 5)).toEqual([]);
    expect(reciprocalRankFusion([[], [7]], 5)).toEqual([{ id: 7, score: 1 / 61 }]);
  });

  it('keeps the order of a list fused with itself', () => {
    const ranking = ['c', 'a', 'd', 'b'];

    expect(reciprocalRankFusion([ranking, ranking], 10).map((hit) => hit.id)).toEqual(ranking);
  });
});
