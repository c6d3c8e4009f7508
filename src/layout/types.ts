/**
 * Grid Layout Type Definitions
 */

/**
 * Layout axis; x runs left to right, y top to bottom
 */
export type Axis = 'x' | 'y';

export const AXES: readonly Axis[] = ['x', 'y'];

/**
 * A grid reference per axis, by name
 */
export type GridRef = [x: string, y: string];

/**
 * Grid line positions by name, per axis
 */
export interface GridPositions {
  x: Map<string, number>;
  y: Map<string, number>;
}

/**
 * Maps a grid-line name to its numeric id on one axis
 */
export type GridIntern = (name: string) => number;
