/**
 * Grid Placement - One Layout Axis
 *
 * Collects cell widths, growth factors and pinned lines for one axis, then
 * places every grid line in two passes:
 *
 * 1. getDesiredGeometry() - every line at its minimum position, giving the
 *    minimum extent of the axis
 * 2. calculatePositions() - the extent grown by a fraction of the spare
 *    space, boundary lines pinned to it and the elastic cells stretched by
 *    energy minimization
 *
 * A growth or place entry may name a line that no cell uses. If cells span
 * that line, they are split there in proportion to grid-line distance.
 *
 * TEST: tests/unit/grid/grid-placement.test.ts
 */

import { Range } from '../geometry/range.js';
import { CellDataEntry, GridData, PlacementState, formatGridData } from './types.js';
import { Resolver } from './resolver.js';
import { GridLogger } from './grid-logger.js';
import {
  InvalidGridDataError,
  PlacementNotComputedError,
  SingularMatrixError,
} from './errors.js';
import { GRID_EDGE_TOLERANCE } from '../shared/config.js';

interface GrowthEntry {
  start: number;
  end: number;
  growth: number;
}

interface PlaceEntry {
  node: number;
  position: number;
}

export class GridPlacement {
  private cells: CellDataEntry<number>[] = [];
  private growths: GrowthEntry[] = [];
  private places: PlaceEntry[] = [];

  private resolver: Resolver<number> | null = null;
  private state: PlacementState = 'empty';
  private minimumSize = 0;
  private size = 0;
  /** Warnings about grid data, from the latest getDesiredGeometry() */
  private dataWarnings: string[] = [];
  /** Warnings from the latest calculatePositions() */
  private solveWarnings: string[] = [];

  constructor(private readonly edgeTolerance: number = GRID_EDGE_TOLERANCE) {}

  /**
   * Add a minimum width between two grid lines
   */
  addCell(start: number, end: number, size: number): void {
    this.addCellData([{ kind: 'width', start, end, size }]);
  }

  /**
   * Add grid data entries
   *
   * @throws InvalidGridDataError for a non-finite value or a cell from a line to itself
   */
  addCellData(entries: Iterable<GridData<number>>): void {
    for (const entry of entries) {
      const text = formatGridData(entry);
      switch (entry.kind) {
        case 'width':
          this.checkLines(text, entry.start, entry.end);
          this.checkFinite(text, entry.size, 'size');
          this.cells.push({ start: entry.start, end: entry.end, size: Math.max(0, entry.size) });
          break;
        case 'growth':
          this.checkLines(text, entry.start, entry.end);
          this.checkFinite(text, entry.growth, 'growth');
          if (entry.growth < 0) {
            GridLogger.warn(`growth ${text} is negative; treated as 0`);
          }
          this.growths.push({ start: entry.start, end: entry.end, growth: Math.max(0, entry.growth) });
          break;
        case 'place':
          this.checkFinite(text, entry.node, 'node');
          this.checkFinite(text, entry.position, 'position');
          this.places.push({ node: entry.node, position: entry.position });
          break;
      }
      this.invalidate();
    }
  }

  /**
   * Drop all grid data and positions
   */
  clear(): void {
    this.cells = [];
    this.growths = [];
    this.places = [];
    this.resolver = null;
    this.state = 'empty';
    this.minimumSize = 0;
    this.size = 0;
    this.dataWarnings = [];
    this.solveWarnings = [];
  }

  getState(): PlacementState {
    return this.state;
  }

  /**
   * Place every line at its minimum position
   *
   * @returns the minimum extent, centered on the origin; Range.none() with no cells
   */
  getDesiredGeometry(): Range {
    this.dataWarnings = [];
    this.solveWarnings = [];
    const resolver = new Resolver(this.splitCells());

    for (const { start, end, growth } of this.growths) {
      if (resolver.setGrowthData(start, end, growth) === 0) {
        this.warn(`growth ${formatGridData({ kind: 'growth', start, end, growth })} matched no cells`);
      }
    }
    for (const { node, position } of this.places) {
      if (resolver.hasNode(node)) {
        resolver.forceNode(node, position);
      } else {
        this.warn(`place [${node}@${position}] names a grid line outside every cell`);
      }
    }

    resolver.assignMinPositions(0);
    this.resolver = resolver;
    this.minimumSize = resolver.size();
    this.size = this.minimumSize;
    this.state = 'desired';

    const bounds = resolver.findBounds();
    return bounds.sub(bounds.center());
  }

  /**
   * Place every line within an allocated extent
   *
   * The extent used is the minimum size plus `expansion` (clamped to 0..1)
   * of the space `size` leaves spare. Unless a line is pinned by place data
   * the result is centered on `center`; if the energy solve fails the lines
   * keep their minimum positions, centered the same way.
   */
  calculatePositions(size: number, center: number, expansion: number): void {
    this.checkFinite('calculatePositions', size, 'size');
    this.checkFinite('calculatePositions', center, 'center');
    this.checkFinite('calculatePositions', expansion, 'expansion');
    if (this.state === 'empty' || this.state === 'accumulating') {
      this.getDesiredGeometry();
    }
    const resolver = this.requireResolver('calculatePositions');
    this.solveWarnings = [];

    const fraction = Math.min(1, Math.max(0, expansion));
    const extra = Math.max(0, size - this.minimumSize);
    const finalSize = this.minimumSize + fraction * extra;
    const low = center - finalSize / 2;

    resolver.clearNodePlacements();
    resolver.assignMinPositions(low);
    resolver.placeEdgeNodes(resolver.getEdgeNodes(this.edgeTolerance), low, low + finalSize);

    try {
      resolver.minimizeEnergy();
      if (!resolver.hasForcedNodes()) {
        // A rigid body can reach past the far edge; keep the extent on center
        const bounds = resolver.findBounds();
        resolver.shiftPositions(center - bounds.center());
      }
    } catch (error) {
      if (!(error instanceof SingularMatrixError)) {
        throw error;
      }
      GridLogger.solveFailed(error.reason, resolver.nodeCount);
      this.solveWarnings.push(`energy minimization failed, using minimum positions: ${error.reason}`);
      resolver.clearNodePlacements();
      resolver.assignMinPositions(center - this.minimumSize / 2);
    }

    this.size = resolver.size();
    this.state = 'final';
    GridLogger.placementComputed(size, center, fraction, this.size);
  }

  /**
   * Positions of two grid lines
   *
   * @throws PlacementNotComputedError before any placement pass
   * @throws UnknownNodeError if either line is not part of any cell
   */
  getSpan(start: number, end: number): [number, number] {
    if (start === end) {
      throw new InvalidGridDataError(`[${start}->${end}]`, 'span from a grid line to itself');
    }
    const resolver = this.requireResolver('getSpan');
    return [resolver.getNodePosition(start), resolver.getNodePosition(end)];
  }

  /**
   * Position of a grid line, if it has one
   */
  getPosition(node: number): number | undefined {
    if (!this.resolver || !this.resolver.hasNode(node)) {
      return undefined;
    }
    return this.resolver.getNodePosition(node);
  }

  /**
   * [line, position] pairs ordered by line
   */
  getPositions(): [number, number][] {
    const resolver = this.resolver;
    if (!resolver) {
      return [];
    }
    return [...resolver.getNodeIds()]
      .sort((a, b) => a - b)
      .map((id): [number, number] => [id, resolver.getNodePosition(id)]);
  }

  /**
   * Extent after the latest placement pass
   */
  getSize(): number {
    return this.size;
  }

  getMinimumSize(): number {
    return this.minimumSize;
  }

  getWarnings(): string[] {
    return [...this.dataWarnings, ...this.solveWarnings];
  }

  toString(): string {
    const lines = [`GridPlacement (${this.state})`];
    lines.push(`  cells: ${this.cells.map((c) => formatGridData({ kind: 'width', ...c })).join(' ')}`);
    if (this.growths.length > 0) {
      lines.push(`  growth: ${this.growths.map((g) => formatGridData({ kind: 'growth', ...g })).join(' ')}`);
    }
    if (this.places.length > 0) {
      lines.push(`  place: ${this.places.map((p) => formatGridData({ kind: 'place', ...p })).join(' ')}`);
    }
    return lines.join('\n');
  }

  /**
   * Cells with every interior line named by growth or place data split out
   */
  private splitCells(): CellDataEntry<number>[] {
    let cells = this.cells.slice();
    const lines: number[] = [];
    for (const { start, end } of this.growths) lines.push(start, end);
    for (const { node } of this.places) lines.push(node);

    for (const x of lines) {
      if (cells.some((c) => c.start === x || c.end === x)) continue;

      const split: CellDataEntry<number>[] = [];
      let spanned = false;
      for (const cell of cells) {
        const { start, end, size } = cell;
        if (Math.min(start, end) < x && x < Math.max(start, end)) {
          const first = (size * (x - start)) / (end - start);
          split.push({ start, end: x, size: first }, { start: x, end, size: size - first });
          spanned = true;
        } else {
          split.push(cell);
        }
      }
      if (spanned) {
        GridLogger.debug(`split cells at interior grid line ${x}`);
        cells = split;
      }
    }
    return cells;
  }

  private requireResolver(operation: string): Resolver<number> {
    if (!this.resolver) {
      throw new PlacementNotComputedError(operation);
    }
    return this.resolver;
  }

  private invalidate(): void {
    this.resolver = null;
    this.state = 'accumulating';
  }

  private warn(message: string): void {
    GridLogger.warn(message);
    this.dataWarnings.push(message);
  }

  private checkLines(entry: string, start: number, end: number): void {
    this.checkFinite(entry, start, 'start');
    this.checkFinite(entry, end, 'end');
    if (start === end) {
      throw new InvalidGridDataError(entry, 'start and end are the same grid line');
    }
  }

  private checkFinite(entry: string, value: number, field: string): void {
    if (!Number.isFinite(value)) {
      throw new InvalidGridDataError(entry, `${field} must be a finite number, got ${value}`);
    }
  }
}
