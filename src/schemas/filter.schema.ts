import { z } from 'zod';

export const filterExpressionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('match'),
    value: z.union([z.string(), z.number(), z.boolean()]),
  }),
  z.object({
    kind: z.literal('range'),
    gt: z.number().optional(),
    gte: z.number().optional(),
    lt: z.number().optional(),
    lte: z.number().optional(),
  }),
  z.object({
    kind: z.literal('any'),
    values: z.union([z.array(z.string()), z.array(z.number())]),
  }),
]);

export const filterSetSchema = z.record(z.string(), filterExpressionSchema);

export type FilterExpression = z.infer<typeof filterExpressionSchema>;
export type RangeExpression = Extract<FilterExpression, { kind: 'range' }>;
export type FilterSet = z.infer<typeof filterSetSchema>;

type RangeBound = 'gt' | 'gte' | 'lt' | 'lte';

// Analyzers answer with either Mongo-style ($gte) or bare (gte) operator keys
const RANGE_OPERATORS: Record<string, RangeBound> = {
  gt: 'gt',
  $gt: 'gt',
  gte: 'gte',
  $gte: 'gte',
  lt: 'lt',
  $lt: 'lt',
  lte: 'lte',
  $lte: 'lte',
};

const EQUALITY_OPERATORS = ['eq', '$eq'];
const MEMBERSHIP_OPERATORS = ['in', '$in'];

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toFiniteNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

const parseLiteral = (value: unknown): FilterExpression | null => {
  if (typeof value === 'string') {
    return value.length > 0 ? { kind: 'match', value } : null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'match', value } : null;
  }

  if (typeof value === 'boolean') {
    return { kind: 'match', value };
  }

  return null;
};

const parseList = (values: unknown[]): FilterExpression | null => {
  const strings = values.filter((value): value is string => typeof value === 'string' && value.length > 0);
  if (strings.length > 0 && strings.length === values.length) {
    return { kind: 'any', values: strings };
  }

  const numbers = values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
  if (numbers.length > 0 && numbers.length === values.length) {
    return { kind: 'any', values: numbers };
  }

  return null;
};

const parseOperatorObject = (raw: Record<string, unknown>): FilterExpression | null => {
  const range: RangeExpression = { kind: 'range' };
  let hasBound = false;

  for (const [operator, operand] of Object.entries(raw)) {
    const bound = RANGE_OPERATORS[operator];
    if (!bound) {
      continue;
    }

    const value = toFiniteNumber(operand);
    if (value !== null) {
      range[bound] = value;
      hasBound = true;
    }
  }

  if (hasBound) {
    return range;
  }

  for (const operator of EQUALITY_OPERATORS) {
    if (operator in raw) {
      return parseLiteral(raw[operator]);
    }
  }

  for (const operator of MEMBERSHIP_OPERATORS) {
    const operand = raw[operator];
    if (Array.isArray(operand)) {
      return parseList(operand);
    }
  }

  return null;
};

/**
 * Converts one loosely-typed analyzer filter value into a tagged expression.
 * Unknown operator keys are ignored; a range with no usable bound yields null.
 */
export const parseFilterExpression = (raw: unknown): FilterExpression | null => {
  if (Array.isArray(raw)) {
    return parseList(raw);
  }

  if (isRecord(raw)) {
    return parseOperatorObject(raw);
  }

  return parseLiteral(raw);
};

export interface ParsedFilterSet {
  filters: FilterSet;
  dropped: string[];
}

export const parseFilterSet = (raw: unknown): ParsedFilterSet => {
  const entries: Array<[string, FilterExpression]> = [];
  const dropped: string[] = [];

  if (!isRecord(raw)) {
    return { filters: {}, dropped };
  }

  for (const [field, value] of Object.entries(raw)) {
    const expression = parseFilterExpression(value);
    if (expression) {
      entries.push([field, expression]);
    } else {
      dropped.push(field);
    }
  }

  // fromEntries defines own keys: "__proto__" must stay a plain entry
  return { filters: Object.fromEntries(entries), dropped };
};
