export { createFetchQuery, type FetchQuery, type Page, type PageSource } from './page-types.js';
export { InMemoryPageSource, type InMemoryPageSourceOptions } from './in-memory-page-source.js';
