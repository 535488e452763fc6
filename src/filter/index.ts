export {
  STANDARD_FILTER_OPERATIONS,
  customOperation,
  isCustomOperation,
  isStandardOperation,
  filterField,
  sortField,
  createFilterSpec,
  filterSpecToRecord,
  filterSpecEquals,
  type StandardFilterOperation,
  type CustomFilterOperation,
  type FilterOperation,
  type FilterField,
  type SortField,
  type FilterSpec,
  type FilterFieldRecord,
  type SortFieldRecord,
  type FilterSpecRecord,
} from './filter-spec.js';
export {
  applyFilterSpec,
  matchesFilterField,
  createSortComparator,
  compareValues,
  readField,
  type ApplyFilterSpecOptions,
  type CustomOperationEvaluator,
} from './apply-filter-spec.js';
