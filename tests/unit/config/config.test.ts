/**
 * Unit Tests - Configuration
 */

import { describe, it, expect } from 'vitest';
import {
  GRID_DEFAULT_EXPANSION,
  GRID_EDGE_TOLERANCE,
  GRID_PIVOT_EPSILON,
  validateConfig,
} from '../../../src/shared/config.js';

describe('config', () => {
  it('should load valid grid settings', () => {
    expect(validateConfig()).toEqual({ valid: true, errors: [] });
    expect(GRID_EDGE_TOLERANCE).toBeGreaterThanOrEqual(0);
    expect(GRID_PIVOT_EPSILON).toBeLessThan(1);
    expect(GRID_DEFAULT_EXPANSION).toBeGreaterThanOrEqual(0);
    expect(GRID_DEFAULT_EXPANSION).toBeLessThanOrEqual(1);
  });
});
