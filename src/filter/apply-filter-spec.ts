/**
 * Runtime evaluation of a FilterSpec against plain objects.
 * Used by the in-memory page source; remote sources translate the FilterSpec into their own query language.
 */

import { canonicalJson } from '../utils/canonical-value.js';
import { isCustomOperation, type FilterField, type FilterSpec, type SortField } from './filter-spec.js';

/**
 * Evaluates a custom operation for one item.
 * @param fieldValue - Value read from the item
 * @param filterValue - Value carried by the filter field
 */
export type CustomOperationEvaluator = (fieldValue: unknown, filterValue: unknown) => boolean;

export interface ApplyFilterSpecOptions {
  /** Evaluators for custom operation codes, keyed by code */
  customOperations?: Record<string, CustomOperationEvaluator>;
  /** Case-insensitive matching for contains, startsWith and endsWith */
  caseInsensitive?: boolean;
}

/**
 * Reads a field from an item. Dotted names walk nested objects (`author.name`).
 */
export function readField(item: unknown, fieldName: string): unknown {
  let current: unknown = item;
  for (const segment of fieldName.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

const valuesEqual = (a: unknown, b: unknown): boolean =>
  a === b || canonicalJson(a) === canonicalJson(b);

const rank = (value: unknown): number => {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number' || typeof value === 'bigint') return 2;
  if (value instanceof Date) return 3;
  if (typeof value === 'string') return 4;
  return 5;
};

/**
 * Orders two field values. Nullish values sort first, then booleans, numbers,
 * dates and strings; values of other kinds compare by their canonical JSON.
 */
export function compareValues(a: unknown, b: unknown): number {
  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== rankB) return rankA - rankB;

  if (rankA === 0) return 0;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  const jsonA = canonicalJson(a);
  const jsonB = canonicalJson(b);
  return jsonA < jsonB ? -1 : jsonA > jsonB ? 1 : 0;
}

const isOrderable = (value: unknown): boolean => rank(value) > 0 && rank(value) < 5;

const textOperands = (
  fieldValue: unknown,
  filterValue: unknown,
  caseInsensitive: boolean
): [string, string] | undefined => {
  if (typeof fieldValue !== 'string' || typeof filterValue !== 'string') {
    return undefined;
  }
  return caseInsensitive
    ? [fieldValue.toLowerCase(), filterValue.toLowerCase()]
    : [fieldValue, filterValue];
};

const toList = (value: unknown): unknown[] => (Array.isArray(value) ? value : [value]);

/**
 * Tests a single filter condition against an item.
 * @throws Error when a custom operation has no registered evaluator
 */
export function matchesFilterField(
  item: unknown,
  field: FilterField,
  options: ApplyFilterSpecOptions = {}
): boolean {
  const fieldValue = readField(item, field.fieldName);
  const { operation, value } = field;
  const caseInsensitive = options.caseInsensitive ?? false;

  if (isCustomOperation(operation)) {
    const evaluate = options.customOperations?.[operation.code];
    if (!evaluate) {
      throw new Error(`No evaluator registered for custom filter operation "${operation.code}"`);
    }
    return evaluate(fieldValue, value);
  }

  switch (operation) {
    case 'equals':
      return valuesEqual(fieldValue, value);
    case 'notEquals':
      return !valuesEqual(fieldValue, value);
    case 'greaterThan':
      return isOrderable(fieldValue) && compareValues(fieldValue, value) > 0;
    case 'greaterThanOrEqual':
      return isOrderable(fieldValue) && compareValues(fieldValue, value) >= 0;
    case 'lessThan':
      return isOrderable(fieldValue) && compareValues(fieldValue, value) < 0;
    case 'lessThanOrEqual':
      return isOrderable(fieldValue) && compareValues(fieldValue, value) <= 0;
    case 'contains': {
      if (Array.isArray(fieldValue)) {
        return fieldValue.some(entry => valuesEqual(entry, value));
      }
      const operands = textOperands(fieldValue, value, caseInsensitive);
      return operands !== undefined && operands[0].includes(operands[1]);
    }
    case 'startsWith': {
      const operands = textOperands(fieldValue, value, caseInsensitive);
      return operands !== undefined && operands[0].startsWith(operands[1]);
    }
    case 'endsWith': {
      const operands = textOperands(fieldValue, value, caseInsensitive);
      return operands !== undefined && operands[0].endsWith(operands[1]);
    }
    case 'isIn':
      return toList(value).some(entry => valuesEqual(fieldValue, entry));
    case 'isNotIn':
      return !toList(value).some(entry => valuesEqual(fieldValue, entry));
    case 'isNull':
      return fieldValue === null || fieldValue === undefined;
    case 'isNotNull':
      return fieldValue !== null && fieldValue !== undefined;
    default: {
      const unreachable: never = operation;
      throw new Error(`Unknown filter operation: ${String(unreachable)}`);
    }
  }
}

/**
 * Builds a comparator from sort keys; earlier keys take precedence.
 */
export function createSortComparator<T>(sorts: readonly SortField[]): (a: T, b: T) => number {
  return (a, b) => {
    for (const sort of sorts) {
      const result = compareValues(readField(a, sort.fieldName), readField(b, sort.fieldName));
      if (result !== 0) {
        return sort.descending ? -result : result;
      }
    }
    return 0;
  };
}

/**
 * Filters (all conditions must hold) and sorts a list. The input is not mutated.
 *
 * @example
 * ```ts
 * const active = applyFilterSpec(products, createFilterSpec({
 *   filters: [filterField('status', 'active')],
 *   sorts: [sortField('price')],
 * }));
 * ```
 */
export function applyFilterSpec<T>(
  items: readonly T[],
  spec: FilterSpec | undefined,
  options: ApplyFilterSpecOptions = {}
): T[] {
  if (!spec) {
    return [...items];
  }

  const filtered = items.filter(item =>
    spec.filters.every(field => matchesFilterField(item, field, options))
  );

  if (spec.sorts.length > 0) {
    filtered.sort(createSortComparator<T>(spec.sorts));
  }

  return filtered;
}
