import type {
  FieldCondition,
  FilterExpression,
  FilterSet,
  NativeFilter,
  RangeCondition,
  SearchLogger,
} from '../../types/hybrid-search.types';
import type { RangeExpression } from '../../schemas/filter.schema';
import { createConsoleLogger } from './logger';

/**
 * keyword: exact match on a scalar payload field
 * number: exact match or range on a numeric payload field
 * keyword_list: "any of" against an array payload field
 */
export type FilterFieldKind = 'keyword' | 'number' | 'keyword_list';

export type FilterFieldRegistry = Record<string, FilterFieldKind>;

export const PRODUCT_FILTER_FIELDS: FilterFieldRegistry = {
  product_code: 'keyword',
  base_price: 'number',
  categories: 'keyword_list',
  series: 'keyword',
  height_value: 'number',
  width_value: 'number',
  depth_value: 'number',
  weight_value: 'number',
  volume_value: 'number',
};

const toRangeCondition = (expression: RangeExpression): RangeCondition | null => {
  const range: RangeCondition = {};
  if (expression.gt !== undefined) range.gt = expression.gt;
  if (expression.gte !== undefined) range.gte = expression.gte;
  if (expression.lt !== undefined) range.lt = expression.lt;
  if (expression.lte !== undefined) range.lte = expression.lte;

  return Object.keys(range).length > 0 ? range : null;
};

const translateExpression = (
  key: string,
  kind: FilterFieldKind,
  expression: FilterExpression,
): FieldCondition | null => {
  switch (expression.kind) {
    case 'match':
      if (kind === 'keyword_list') {
        return typeof expression.value === 'string'
          ? { key, match: { any: [expression.value] } }
          : null;
      }
      return { key, match: { value: expression.value } };

    case 'any':
      if (expression.values.length === 0) {
        return null;
      }
      // lists are homogeneous, the first entry tells the element type
      if (kind === 'number' && typeof expression.values[0] === 'string') {
        return null;
      }
      return { key, match: { any: expression.values } };

    case 'range': {
      if (kind !== 'number') {
        return null;
      }
      const range = toRangeCondition(expression);
      return range ? { key, range } : null;
    }
  }
};

export interface FilterTranslatorOptions {
  fields?: FilterFieldRegistry;
  logger?: SearchLogger;
}

/**
 * Converts a filter-set into a vector store filter: one condition per field,
 * all of which must hold. Returns null (match everything) when nothing
 * translates.
 */
export class FilterTranslator {
  private readonly fields: FilterFieldRegistry;
  private readonly logger: SearchLogger;

  constructor(options: FilterTranslatorOptions = {}) {
    this.fields = options.fields ?? PRODUCT_FILTER_FIELDS;
    this.logger = options.logger ?? createConsoleLogger('FilterTranslator');
  }

  translate(filters: FilterSet): NativeFilter | null {
    const must: FieldCondition[] = [];

    for (const [field, expression] of Object.entries(filters)) {
      const kind = Object.hasOwn(this.fields, field) ? this.fields[field] : undefined;
      if (!kind) {
        this.logger.warn(`Ignoring filter on unknown field "${field}"`);
        continue;
      }

      const condition = translateExpression(field, kind, expression);
      if (!condition) {
        this.logger.warn(`Ignoring ${expression.kind} filter on ${kind} field "${field}"`);
        continue;
      }

      must.push(condition);
    }

    return must.length > 0 ? { must } : null;
  }
}
