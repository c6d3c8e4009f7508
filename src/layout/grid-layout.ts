/**
 * Grid Layout - Two Axis Composition
 *
 * Places rectangular regions on a grid by running one GridPlacement per
 * axis. Grid lines are named; names are interned to numeric ids per axis in
 * order of first use, so the lines of an axis keep their declared order.
 *
 * Usage:
 *   const grid = new GridLayout();
 *   grid.addCellDataText('x', 'a 10 b 20+1 c');
 *   grid.addCellDataText('y', 'top 5 bottom');
 *   const desired = grid.getDesiredGeometry();
 *   grid.layout(BBox.fromCorners(0, 0, 100, 40));
 *   grid.gridBBox(['a', 'top'], ['b', 'bottom']);
 *
 * TEST: tests/integration/layout/grid-layout.test.ts
 */

import { BBox } from '../geometry/bbox.js';
import { GridPlacement } from '../grid/grid-placement.js';
import { GridData } from '../grid/types.js';
import { UnknownNodeError } from '../grid/errors.js';
import { GridLogger } from '../grid/grid-logger.js';
import { GRID_DEFAULT_EXPANSION } from '../shared/config.js';
import { parseCellData } from './cell-data-parser.js';
import { AXES, Axis, GridPositions, GridRef } from './types.js';

interface AxisState {
  placement: GridPlacement;
  ids: Map<string, number>;
  expand: number;
}

export class GridLayout {
  private readonly axes: Record<Axis, AxisState>;

  constructor() {
    this.axes = {
      x: { placement: new GridPlacement(), ids: new Map(), expand: GRID_DEFAULT_EXPANSION },
      y: { placement: new GridPlacement(), ids: new Map(), expand: GRID_DEFAULT_EXPANSION },
    };
  }

  /**
   * Numeric id of a grid line, creating it if needed
   */
  addGridId(axis: Axis, name: string): number {
    const ids = this.axes[axis].ids;
    let id = ids.get(name);
    if (id === undefined) {
      id = ids.size;
      ids.set(name, id);
    }
    return id;
  }

  findGridId(axis: Axis, name: string): number | undefined {
    return this.axes[axis].ids.get(name);
  }

  /**
   * Fraction (0..1) of the spare space an axis takes up on layout
   */
  setGridExpand(axis: Axis, expansion: number): void {
    this.axes[axis].expand = expansion;
  }

  getGridExpand(axis: Axis): number {
    return this.axes[axis].expand;
  }

  getPlacement(axis: Axis): GridPlacement {
    return this.axes[axis].placement;
  }

  addCellData(x: Iterable<GridData<number>>, y: Iterable<GridData<number>>): void {
    this.axes.x.placement.addCellData(x);
    this.axes.y.placement.addCellData(y);
  }

  /**
   * Parse cell data text for one axis and add it
   */
  addCellDataText(axis: Axis, text: string): void {
    const data = parseCellData(text, (name) => this.addGridId(axis, name));
    this.axes[axis].placement.addCellData(data);
  }

  /**
   * Add an element spanning two named grid references with a minimum size
   */
  addGridElement(start: GridRef, end: GridRef, size: [width: number, height: number]): void {
    AXES.forEach((axis, i) => {
      this.axes[axis].placement.addCell(
        this.addGridId(axis, start[i]),
        this.addGridId(axis, end[i]),
        size[i]
      );
    });
  }

  /**
   * Minimum extent of the grid, centered on the origin
   */
  getDesiredGeometry(): BBox {
    const x = this.axes.x.placement.getDesiredGeometry();
    const y = this.axes.y.placement.getDesiredGeometry();
    if (x.isNone() || y.isNone()) {
      return BBox.none();
    }
    return BBox.ofRanges(x, y);
  }

  /**
   * Place both axes within a rectangle
   */
  layout(within: BBox): void {
    const [cx, cy, w, h] = within.getCwh();
    const { x, y } = this.axes;
    x.placement.calculatePositions(w, cx, x.expand);
    y.placement.calculatePositions(h, cy, y.expand);
    for (const axis of AXES) {
      for (const warning of this.axes[axis].placement.getWarnings()) {
        GridLogger.debug(`${axis} axis: ${warning}`);
      }
    }
  }

  /**
   * Rectangle between two named grid references
   *
   * @throws UnknownNodeError if a name is not a grid line
   */
  gridBBox(start: GridRef, end: GridRef): BBox {
    const [x0, x1] = this.axes.x.placement.getSpan(this.requireId('x', start[0]), this.requireId('x', end[0]));
    const [y0, y1] = this.axes.y.placement.getSpan(this.requireId('y', start[1]), this.requireId('y', end[1]));
    return BBox.fromCorners(x0, y0, x1, y1);
  }

  /**
   * Position of every named grid line, per axis
   */
  getGridPositions(): GridPositions {
    return { x: this.axisPositions('x'), y: this.axisPositions('y') };
  }

  private axisPositions(axis: Axis): Map<string, number> {
    const { ids, placement } = this.axes[axis];
    const positions = new Map<string, number>();
    for (const [name, id] of ids) {
      const position = placement.getPosition(id);
      if (position === undefined) {
        throw new UnknownNodeError(name, `${axis} grid positions`);
      }
      positions.set(name, position);
    }
    return positions;
  }

  private requireId(axis: Axis, name: string): number {
    const id = this.findGridId(axis, name);
    if (id === undefined) {
      throw new UnknownNodeError(name, `${axis} grid line`);
    }
    return id;
  }
}
