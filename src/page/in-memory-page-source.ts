import type { FetchQuery, Page, PageSource } from './page-types.js';
import { applyFilterSpec, type ApplyFilterSpecOptions } from '../filter/apply-filter-spec.js';

export interface InMemoryPageSourceOptions extends ApplyFilterSpecOptions {
  /** Artificial delay before each page resolves, in milliseconds */
  latencyMs?: number;
}

/**
 * Offset-paginated source over an in-memory array.
 * Page keys are offsets into the filtered, sorted list.
 */
export class InMemoryPageSource<T> implements PageSource<T, number> {
  private items: T[];
  private fetchCount = 0;

  constructor(
    items: readonly T[],
    private readonly options: InMemoryPageSourceOptions = {}
  ) {
    this.items = [...items];
  }

  async fetch(query: FetchQuery<number>): Promise<Page<T, number>> {
    this.fetchCount++;

    if (this.options.latencyMs !== undefined && this.options.latencyMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.options.latencyMs));
    }

    const matching = applyFilterSpec(this.items, query.filter, this.options);
    const offset = query.pageKey ?? 0;
    const end = offset + query.pageSize;
    const isLast = end >= matching.length;

    return {
      items: matching.slice(offset, end),
      nextKey: isLast ? undefined : end,
      isLast,
      totalCount: matching.length,
    };
  }

  /**
   * Replaces the backing data.
   */
  setItems(items: readonly T[]): void {
    this.items = [...items];
  }

  /**
   * Number of fetch calls served so far.
   */
  get calls(): number {
    return this.fetchCount;
  }
}
