/**
 * Grid Module Exports
 */

export * from './types.js';
export * from './errors.js';
export { Link } from './link.js';
export { GridNode } from './node.js';
export { LUPDecomposition } from './lup-decomposition.js';
export { EquationSet } from './equation-set.js';
export { Resolver } from './resolver.js';
export { GridPlacement } from './grid-placement.js';
export { GridLogger, GridLogLevel } from './grid-logger.js';
