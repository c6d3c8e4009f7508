/**
 * gridspring
 *
 * Constraint-based grid placement for diagram layout.
 */

export * from './geometry/index.js';
export * from './grid/index.js';
export * from './layout/index.js';
export { validateConfig } from './shared/config.js';
