/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 * This prevents hardcoded values scattered throughout the codebase.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

/**
 * Application Configuration
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const DEBUG = process.env.DEBUG === 'true';

/**
 * Logging
 * Use /tmp explicitly (not os.tmpdir()) so the log location is predictable
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'gridspring.log');
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
export const SUPPRESS_TEST_LOGS = process.env.SUPPRESS_TEST_LOGS === 'true' || NODE_ENV === 'test';

/**
 * Grid Placement Configuration
 */
// Distance from the bounds within which a node counts as an edge node
export const GRID_EDGE_TOLERANCE = parseFloat(process.env.GRID_EDGE_TOLERANCE || '1e-7');
// Pivots at or below this fraction of the largest entry in their row are treated as zero
export const GRID_PIVOT_EPSILON = parseFloat(process.env.GRID_PIVOT_EPSILON || '1e-12');
// Expansion used by a 2D layout axis until one is set explicitly
export const GRID_DEFAULT_EXPANSION = parseFloat(process.env.GRID_DEFAULT_EXPANSION || '0');

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

/**
 * Validate configuration values
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!LOG_LEVELS.includes(LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${LOG_LEVEL}'`);
  }

  if (!Number.isFinite(GRID_EDGE_TOLERANCE) || GRID_EDGE_TOLERANCE < 0) {
    errors.push(`GRID_EDGE_TOLERANCE must be a number >= 0, got ${GRID_EDGE_TOLERANCE}`);
  }

  if (!Number.isFinite(GRID_PIVOT_EPSILON) || GRID_PIVOT_EPSILON < 0 || GRID_PIVOT_EPSILON >= 1) {
    errors.push(`GRID_PIVOT_EPSILON must be in [0, 1), got ${GRID_PIVOT_EPSILON}`);
  }

  if (!Number.isFinite(GRID_DEFAULT_EXPANSION) || GRID_DEFAULT_EXPANSION < 0 || GRID_DEFAULT_EXPANSION > 1) {
    errors.push(`GRID_DEFAULT_EXPANSION must be between 0 and 1, got ${GRID_DEFAULT_EXPANSION}`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
