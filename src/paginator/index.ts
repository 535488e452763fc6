export { Paginator, DEFAULT_PAGE_SIZE, type PaginatorOptions } from './paginator.js';
export { initialPageState, patchPageState, type PageState, type PageStatus } from './page-state.js';
export { StateEmitter, type StateListener } from './state-emitter.js';
export type { PaginatorLogger, PaginatorLogEntry, PaginatorLogEvent } from './paginator-logger.js';
export {
  PaginatorError,
  PaginatorConfigurationError,
  CacheMissError,
  toError,
} from './paginator-errors.js';
export * from './strategies/index.js';
