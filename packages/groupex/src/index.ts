/**
 * groupex: parse strings of user-defined values, operators and groupings
 * into trees, and reduce those trees to results.
 *
 * @module groupex
 */

export * from './expression/index.js';
export * from './grammar/index.js';
export { createLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LogMeta } from './utils/logger.js';
