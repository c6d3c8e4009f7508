/**
 * Unit Tests - Grid Logger
 *
 * Warnings reach the log file in every mode; setEnabled(false) silences it.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fs from 'fs';
import { GridLogger } from '../../../src/grid/grid-logger.js';
import { LOG_PATH } from '../../../src/shared/config.js';

function readLog(): string {
  return fs.existsSync(LOG_PATH) ? fs.readFileSync(LOG_PATH, 'utf-8') : '';
}

describe('GridLogger', () => {
  beforeEach(() => {
    GridLogger.setEnabled(true);
  });

  it('should write warnings while test logs are suppressed', () => {
    const message = `warning check ${process.pid}-${Date.now()}`;
    GridLogger.warn(message);

    expect(readLog()).toContain(`[Grid:WARN] ${message}\n`);
  });

  it('should write solver fallbacks', () => {
    const reason = `fallback check ${process.pid}-${Date.now()}`;
    GridLogger.solveFailed(reason, 3);

    expect(readLog()).toContain(
      `[Grid:WARN] energy minimization failed for 3 nodes, using minimum positions: ${reason}\n`
    );
  });

  it('should write nothing when disabled', () => {
    GridLogger.setEnabled(false);
    const message = `disabled check ${process.pid}-${Date.now()}`;
    GridLogger.warn(message);

    expect(readLog()).not.toContain(message);
  });
});
