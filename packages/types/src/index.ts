/**
 * Shared contracts for the TRON resource monitor.
 *
 * The package is type-only: every export is an interface or type alias, so it
 * is erased at compile time and never needs a build of its own.
 */
export type * from './logging/index.js';
export type * from './resource-monitor/index.js';
export type * from './report/index.js';
