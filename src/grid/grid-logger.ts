/**
 * Grid Logger
 *
 * Centralized logging for grid placement.
 * Tracks ignored growth data, solver fallbacks and completed placements.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL, DEBUG } from '../shared/config.js';

/**
 * Log levels for grid operations
 */
export enum GridLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Grid logger utility
 */
export class GridLogger {
  private static enabled = true;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: GridLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [Grid:${level}] ${message}`;

    fs.appendFileSync(LOG_PATH, logMsg + '\n');
  }

  private static debugEnabled(): boolean {
    return DEBUG || LOG_LEVEL === 'DEBUG';
  }

  /**
   * Log growth data that could not be attached to any link
   */
  static growthIgnored(start: string, end: string, growth: number, reason: string): void {
    this.log(GridLogLevel.WARN, `growth ${start}->${end}:+${growth} ignored: ${reason}`);
  }

  /**
   * Log an energy minimization that fell back to minimum-size positions
   */
  static solveFailed(reason: string, nodeCount: number): void {
    this.log(
      GridLogLevel.WARN,
      `energy minimization failed for ${nodeCount} nodes, using minimum positions: ${reason}`
    );
  }

  /**
   * Log a completed placement pass
   */
  static placementComputed(size: number, center: number, expansion: number, finalSize: number): void {
    if (SUPPRESS_TEST_LOGS || !this.debugEnabled()) return; // Skip in test mode
    this.log(
      GridLogLevel.DEBUG,
      `placed size=${size} center=${center} expansion=${expansion} -> extent ${finalSize}`
    );
  }

  /**
   * Log warning message
   */
  static warn(message: string): void {
    this.log(GridLogLevel.WARN, message);
  }

  /**
   * Log debug message
   */
  static debug(message: string): void {
    if (SUPPRESS_TEST_LOGS || !this.debugEnabled()) return;
    this.log(GridLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}
