import { describe, it, expect } from 'vitest';
import { parseFilterExpression, parseFilterSet } from '../filter.schema';

describe('parseFilterExpression', () => {
  it('parses literals as exact matches', () => {
    expect(parseFilterExpression('Chap')).toEqual({ kind: 'match', value: 'Chap' });
    expect(parseFilterExpression(1004)).toEqual({ kind: 'match', value: 1004 });
    expect(parseFilterExpression(true)).toEqual({ kind: 'match', value: true });
  });

  it('parses homogeneous lists as any-of', () => {
    expect(parseFilterExpression(['Workplace', 'Stools'])).toEqual({ kind: 'any', values: ['Workplace', 'Stools'] });
    expect(parseFilterExpression([20, 25])).toEqual({ kind: 'any', values: [20, 25] });
  });

  it('rejects mixed or empty lists', () => {
    expect(parseFilterExpression([1, 'a'])).toBeNull();
    expect(parseFilterExpression([])).toBeNull();
  });

  it('accepts bare and dollar-prefixed range operators', () => {
    expect(parseFilterExpression({ gte: 100, lte: 500 })).toEqual({ kind: 'range', gte: 100, lte: 500 });
    expect(parseFilterExpression({ $gt: 40 })).toEqual({ kind: 'range', gt: 40 });
  });

  it('coerces numeric strings in range bounds', () => {
    expect(parseFilterExpression({ $lte: '500' })).toEqual({ kind: 'range', lte: 500 });
  });

  it('drops a range without a usable bound', () => {
    expect(parseFilterExpression({ gte: 'cheap' })).toBeNull();
    expect(parseFilterExpression({ lt: null })).toBeNull();
  });

  it('ignores unknown operator keys', () => {
    expect(parseFilterExpression({ lte: 300, $regex: 'chair' })).toEqual({ kind: 'range', lte: 300 });
    expect(parseFilterExpression({ near: 5 })).toBeNull();
  });

  it('parses equality and membership operators', () => {
    expect(parseFilterExpression({ $eq: '1004' })).toEqual({ kind: 'match', value: '1004' });
    expect(parseFilterExpression({ in: ['Healthcare'] })).toEqual({ kind: 'any', values: ['Healthcare'] });
  });

  it('rejects empty strings and nulls', () => {
    expect(parseFilterExpression('')).toBeNull();
    expect(parseFilterExpression(null)).toBeNull();
    expect(parseFilterExpression(Number.NaN)).toBeNull();
  });
});

describe('parseFilterSet', () => {
  it('parses every field and reports the ones it drops', () => {
    const result = parseFilterSet({
      base_price: { lte: 500 },
      categories: ['Workplace'],
      bogus: {},
    });

    expect(result).toEqual({
      filters: {
        base_price: { kind: 'range', lte: 500 },
        categories: { kind: 'any', values: ['Workplace'] },
      },
      dropped: ['bogus'],
    });
  });

  it('returns an empty set for non-object input', () => {
    expect(parseFilterSet('nope')).toEqual({ filters: {}, dropped: [] });
    expect(parseFilterSet(undefined)).toEqual({ filters: {}, dropped: [] });
    expect(parseFilterSet([1, 2])).toEqual({ filters: {}, dropped: [] });
  });

  it('keeps "__proto__" as a plain entry', () => {
    const { filters, dropped } = parseFilterSet(JSON.parse('{"__proto__": "x", "constructor": ["a"]}'));

    expect(Object.getPrototypeOf(filters)).toBe(Object.prototype);
    expect(Object.keys(filters)).toEqual(['__proto__', 'constructor']);
    expect(Object.entries(filters)).toEqual([
      ['__proto__', { kind: 'match', value: 'x' }],
      ['constructor', { kind: 'any', values: ['a'] }],
    ]);
    expect(dropped).toEqual([]);
  });
});
