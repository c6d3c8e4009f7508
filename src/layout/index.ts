/**
 * Layout Module Exports
 */

export * from './types.js';
export { GridLayout } from './grid-layout.js';
export { parseCellData } from './cell-data-parser.js';
