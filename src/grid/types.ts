/**
 * Grid Placement Type Definitions
 */

/**
 * Node identifier
 *
 * Used purely as a Map key; any string or number works as a grid line id.
 */
export type NodeId = string | number;

/**
 * Minimum distance between two nodes
 *
 * Several entries for the same start/end pair may exist; the largest size is enforced.
 */
export interface CellDataEntry<N extends NodeId = NodeId> {
  start: N;
  end: N;
  size: number;
}

/**
 * Grid data supplied by callers
 */
export type GridData<N extends NodeId = number> =
  | { kind: 'width'; start: N; end: N; size: number }
  | { kind: 'growth'; start: N; end: N; growth: number }
  | { kind: 'place'; node: N; position: number };

/**
 * Nodes at the extremes of the current position range
 */
export interface EdgeNodes<N extends NodeId = NodeId> {
  low: N[];
  high: N[];
}

/**
 * Per-axis placement lifecycle
 *
 * empty → accumulating → desired → final; adding data returns to accumulating.
 */
export type PlacementState = 'empty' | 'accumulating' | 'desired' | 'final';

export function widthData<N extends NodeId>(start: N, end: N, size: number): GridData<N> {
  return { kind: 'width', start, end, size };
}

export function growthData<N extends NodeId>(start: N, end: N, growth: number): GridData<N> {
  return { kind: 'growth', start, end, growth };
}

export function placeData<N extends NodeId>(node: N, position: number): GridData<N> {
  return { kind: 'place', node, position };
}

/**
 * Format grid data as [s->e:w], [s->e:+g] or [n@p]
 */
export function formatGridData<N extends NodeId>(data: GridData<N>): string {
  switch (data.kind) {
    case 'width':
      return `[${data.start}->${data.end}:${data.size}]`;
    case 'growth':
      return `[${data.start}->${data.end}:+${data.growth}]`;
    case 'place':
      return `[${data.node}@${data.position}]`;
  }
}
