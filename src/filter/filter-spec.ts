/**
 * Filter and sort specification handed to page sources.
 * Pure data: sources interpret it for their backend, the paginator only uses it
 * to build queries and cache keys.
 */

import { canonicalize, canonicalJson } from '../utils/canonical-value.js';

// ─────────────────────────────────────────────────────────────────────────────
// Operations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The built-in comparison operations.
 */
export const STANDARD_FILTER_OPERATIONS = [
  'equals',
  'notEquals',
  'greaterThan',
  'greaterThanOrEqual',
  'lessThan',
  'lessThanOrEqual',
  'contains',
  'startsWith',
  'endsWith',
  'isIn',
  'isNotIn',
  'isNull',
  'isNotNull',
] as const;

export type StandardFilterOperation = typeof STANDARD_FILTER_OPERATIONS[number];

/**
 * Backend-specific operation carried as an opaque code,
 * e.g. `array-contains` for a document store or `ILIKE` for SQL.
 */
export interface CustomFilterOperation {
  readonly kind: 'custom';
  readonly code: string;
}

export type FilterOperation = StandardFilterOperation | CustomFilterOperation;

/**
 * Creates a custom filter operation.
 *
 * @example
 * ```ts
 * filterField('tags', 'typescript', customOperation('array-contains'));
 * ```
 */
export const customOperation = (code: string): CustomFilterOperation =>
  Object.freeze({ kind: 'custom', code });

export const isCustomOperation = (operation: FilterOperation): operation is CustomFilterOperation =>
  typeof operation === 'object';

export const isStandardOperation = (value: unknown): value is StandardFilterOperation =>
  typeof value === 'string' && (STANDARD_FILTER_OPERATIONS as readonly string[]).includes(value);

// ─────────────────────────────────────────────────────────────────────────────
// Fields
// ─────────────────────────────────────────────────────────────────────────────

export interface FilterField {
  readonly fieldName: string;
  readonly value: unknown;
  readonly operation: FilterOperation;
}

export interface SortField {
  readonly fieldName: string;
  readonly descending: boolean;
}

export interface FilterSpec {
  readonly filters: readonly FilterField[];
  readonly sorts: readonly SortField[];
}

/**
 * Creates a filter condition. The operation defaults to `equals`.
 */
export const filterField = (
  fieldName: string,
  value: unknown,
  operation: FilterOperation = 'equals'
): FilterField => Object.freeze({ fieldName, value, operation });

/**
 * Creates a sort key. Ascending unless `descending` is set.
 */
export const sortField = (fieldName: string, descending = false): SortField =>
  Object.freeze({ fieldName, descending });

/**
 * Builds a frozen filter specification.
 *
 * @example
 * ```ts
 * const spec = createFilterSpec({
 *   filters: [
 *     filterField('status', 'active'),
 *     filterField('price', 100, 'greaterThan'),
 *   ],
 *   sorts: [sortField('createdAt', true)],
 * });
 * ```
 */
export function createFilterSpec(input: {
  filters?: readonly FilterField[];
  sorts?: readonly SortField[];
} = {}): FilterSpec {
  return Object.freeze({
    filters: Object.freeze([...(input.filters ?? [])]),
    sorts: Object.freeze([...(input.sorts ?? [])]),
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialization & equality
// ─────────────────────────────────────────────────────────────────────────────

export interface FilterFieldRecord {
  fieldName: string;
  operation: StandardFilterOperation | { custom: string };
  value: unknown;
}

export interface SortFieldRecord {
  fieldName: string;
  order: 'asc' | 'desc';
}

export interface FilterSpecRecord {
  filters: FilterFieldRecord[];
  sorts: SortFieldRecord[];
}

/**
 * Converts a specification to a JSON-safe record, preserving the order of
 * filters and sorts. Filter values are canonicalized.
 */
export function filterSpecToRecord(spec: FilterSpec): FilterSpecRecord {
  return {
    filters: spec.filters.map(field => ({
      fieldName: field.fieldName,
      operation: isCustomOperation(field.operation)
        ? { custom: field.operation.code }
        : field.operation,
      value: canonicalize(field.value),
    })),
    sorts: spec.sorts.map(sort => ({
      fieldName: sort.fieldName,
      order: sort.descending ? 'desc' : 'asc',
    })),
  };
}

/**
 * Structural, order-sensitive equality. Two absent specs are equal;
 * an absent spec never equals an empty one.
 */
export function filterSpecEquals(a: FilterSpec | undefined, b: FilterSpec | undefined): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  if (a.filters.length !== b.filters.length || a.sorts.length !== b.sorts.length) {
    return false;
  }
  return canonicalJson(filterSpecToRecord(a)) === canonicalJson(filterSpecToRecord(b));
}
