/**
 * Events reported to a paginator logger.
 */
export type PaginatorLogEvent =
  | 'fetch'
  | 'retry'
  | 'cache-hit'
  | 'cache-miss'
  | 'cache-write'
  | 'cache-write-failed'
  | 'background-refresh-failed'
  | 'stale-result'
  | 'load-error';

/**
 * Represents a single paginator log entry
 */
export interface PaginatorLogEntry {
  event: PaginatorLogEvent;
  /** Cache key of the query involved */
  cacheKey?: string;
  /** Retry number, for `retry` entries */
  attempt?: number;
  error?: Error;
}

/**
 * Function type for paginator logging callbacks
 * @param entry - The log entry to process
 */
export type PaginatorLogger = (entry: PaginatorLogEntry) => void;
