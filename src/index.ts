/**
 * pagesmith core exports.
 * Provides the paginator engine, filter specifications, page stores and retry helpers.
 */
export * from './filter/index.js';
export * from './page/index.js';
export * from './cache/index.js';
export * from './retry/index.js';
export * from './paginator/index.js';
export { canonicalize, canonicalJson } from './utils/canonical-value.js';
