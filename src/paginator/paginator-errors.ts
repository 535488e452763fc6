/**
 * Base class for errors raised by the paginator itself
 * (as opposed to errors thrown by a page source).
 */
export class PaginatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid options, or a cache policy that cannot run with the given setup.
 * Never retried.
 */
export class PaginatorConfigurationError extends PaginatorError {}

/**
 * Raised under the cache-only policy when nothing is cached for a query.
 */
export class CacheMissError extends PaginatorError {
  constructor(readonly cacheKey: string) {
    super('No cached data available for this query');
  }
}

/**
 * Normalizes anything thrown into an Error, keeping the original as `cause`.
 */
export const toError = (value: unknown): Error => {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value), { cause: value });
};
