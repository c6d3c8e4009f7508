/**
 * Resolver - Graph Construction and Scheduling for One Grid Dimension
 *
 * Built from link data that defines a DAG of nodes (possibly with more
 * than one root). From the DAG the *minimum* position of each node is
 * deduced by walking from the roots, where a node is only visited once
 * all of its predecessors have positions.
 *
 * Positions can then be refined by minimizing the energy of the elastic
 * links, with the boundary nodes pinned to the allocated extent.
 *
 * TEST: tests/unit/grid/resolver.test.ts
 */

import { Range } from '../geometry/range.js';
import { CellDataEntry, EdgeNodes, NodeId } from './types.js';
import { Link } from './link.js';
import { GridNode } from './node.js';
import { EquationSet } from './equation-set.js';
import { GridLogger } from './grid-logger.js';
import {
  CycleError,
  DegenerateLinkError,
  UnknownNodeError,
  UnresolvedPositionError,
} from './errors.js';

interface BodyPin {
  forced?: number;
  /** Lowest placed position of any member, and the body position it implies */
  lowestPlaced?: number;
  placed?: number;
}

export class Resolver<N extends NodeId = NodeId> {
  /** Node ids in creation order; the index is the node's equation row */
  private readonly nodeIds: N[] = [];
  private readonly nodes = new Map<N, GridNode<N>>();
  /** Links by start id, then end id */
  private readonly links = new Map<N, Map<N, Link<N>>>();
  /** Nodes that are never the end of a link */
  private readonly roots: N[] = [];
  /** Nodes that are never the start of a link */
  private readonly leaves: N[] = [];
  private readonly resolutionOrder: N[];

  constructor(entries: Iterable<CellDataEntry<N>> = []) {
    for (const { start, end, size } of entries) {
      if (start === end) {
        throw new DegenerateLinkError(String(start));
      }
      const existing = this.getLink(start, end);
      if (existing) {
        existing.union(size);
        continue;
      }

      let outgoing = this.links.get(start);
      if (!outgoing) {
        outgoing = new Map();
        this.links.set(start, outgoing);
      }
      outgoing.set(end, new Link(start, end, size));
      this.ensureNode(start).addEndpoint(end);
      this.ensureNode(end).addStartpoint(start);
    }

    for (const id of this.nodeIds) {
      const node = this.getNode(id, 'construction');
      if (node.isRoot()) this.roots.push(id);
      if (node.isLeaf()) this.leaves.push(id);
    }
    this.resolutionOrder = this.createResolutionOrder();
  }

  get nodeCount(): number {
    return this.nodeIds.length;
  }

  hasNode(id: N): boolean {
    return this.nodes.has(id);
  }

  getRoots(): readonly N[] {
    return this.roots;
  }

  getLeaves(): readonly N[] {
    return this.leaves;
  }

  getResolutionOrder(): readonly N[] {
    return this.resolutionOrder;
  }

  getNodeIds(): readonly N[] {
    return this.nodeIds;
  }

  getLink(start: N, end: N): Link<N> | undefined {
    return this.links.get(start)?.get(end);
  }

  /**
   * All links, grouped by start node in creation order
   */
  getLinks(): Link<N>[] {
    const result: Link<N>[] = [];
    for (const outgoing of this.links.values()) {
      result.push(...outgoing.values());
    }
    return result;
  }

  /**
   * Set the growth of every link on a path from start to end
   *
   * @returns number of links updated; 0 (with a warning) if either node is
   *          missing or nothing links them
   */
  setGrowthData(start: N, end: N, growth: number): number {
    if (!this.hasNode(start) || !this.hasNode(end)) {
      GridLogger.growthIgnored(String(start), String(end), growth, 'node not in the graph');
      return 0;
    }

    const reachable = this.reachableNodes(start);
    const between = new Set<N>();
    for (const id of this.predecessorNodes(end)) {
      if (reachable.has(id)) between.add(id);
    }

    let updated = 0;
    for (const id of between) {
      for (const e of this.getNode(id, 'growth').linkEnds) {
        const link = this.getLink(id, e);
        if (link && between.has(e)) {
          link.setGrowth(growth);
          updated++;
        }
      }
    }
    if (updated === 0) {
      GridLogger.growthIgnored(String(start), String(end), growth, 'no links between the nodes');
    }
    return updated;
  }

  forceNode(id: N, position: number | undefined): void {
    this.getNode(id, 'force').forcedPosition = position;
  }

  placeNode(id: N, position: number | undefined): void {
    this.getNode(id, 'place').placedPosition = position;
  }

  hasForcedNodes(): boolean {
    for (const node of this.nodes.values()) {
      if (node.forcedPosition !== undefined) return true;
    }
    return false;
  }

  /**
   * Reset placed and derived positions; forced positions are kept
   */
  clearNodePlacements(): void {
    for (const node of this.nodes.values()) {
      node.placedPosition = undefined;
      node.resetPosition();
    }
  }

  /**
   * Assign the minimum position of every node
   *
   * Roots sit at the anchor unless forced or placed; every other node is
   * as far left as its incoming links allow (longest path from the roots).
   */
  assignMinPositions(anchor = 0): void {
    for (const node of this.nodes.values()) {
      node.resetPosition();
    }
    for (const id of this.resolutionOrder) {
      const node = this.getNode(id, 'minimum positions');
      if (node.forcedPosition !== undefined) {
        node.position = node.forcedPosition;
      } else if (node.placedPosition !== undefined) {
        node.position = node.placedPosition;
      } else if (node.isRoot()) {
        node.position = anchor;
      } else {
        let position = -Infinity;
        for (const s of node.linkStarts) {
          const minSize = this.getLink(s, id)?.minSize ?? 0;
          position = Math.max(position, this.positionOf(s) + minSize);
        }
        node.position = position;
      }
    }
  }

  /**
   * Min and max of all nodes with positions
   */
  findBounds(): Range {
    let bounds = Range.none();
    for (const node of this.nodes.values()) {
      const p = node.getPosition();
      if (p !== undefined) {
        bounds = bounds.include(p);
      }
    }
    return bounds;
  }

  size(): number {
    return this.findBounds().size();
  }

  /**
   * Move every derived position by delta
   */
  shiftPositions(delta: number): void {
    for (const node of this.nodes.values()) {
      if (node.position !== undefined) {
        node.position += delta;
      }
    }
  }

  /**
   * Nodes within tolerance of the low and high ends of the current bounds
   *
   * With no extent to tell the ends apart, the roots are the low edge and
   * the leaves the high edge.
   */
  getEdgeNodes(tolerance: number): EdgeNodes<N> {
    const edges: EdgeNodes<N> = { low: [], high: [] };
    const bounds = this.findBounds();
    if (bounds.isNone()) {
      return edges;
    }
    if (bounds.size() <= tolerance) {
      return { low: [...this.roots], high: [...this.leaves] };
    }
    for (const id of this.nodeIds) {
      const p = this.getNode(id, 'edge nodes').getPosition();
      if (p === undefined) continue;
      if (p - bounds.min <= tolerance) edges.low.push(id);
      if (bounds.max - p <= tolerance) edges.high.push(id);
    }
    return edges;
  }

  placeEdgeNodes(edges: EdgeNodes<N>, min?: number, max?: number): void {
    if (min !== undefined) {
      for (const id of edges.low) this.placeNode(id, min);
    }
    if (max !== undefined) {
      for (const id of edges.high) this.placeNode(id, max);
    }
  }

  /**
   * Create the EquationSet for the energies of the elastic links
   *
   * Nodes joined by inelastic links form rigid bodies that keep the gaps
   * of the last minimum-position sweep. Each body has one free unknown (its
   * lowest-index node); the other members are tied to it by their offset.
   * A body is pinned by its first forced member, else by its member placed
   * lowest.
   */
  createEnergyMatrix(): EquationSet {
    const size = this.nodeIds.length;
    const eqns = new EquationSet(size);
    const positions = this.nodeIds.map((id) => this.positionOf(id));

    const parent = this.nodeIds.map((_, i) => i);
    const find = (i: number): number => {
      while (parent[i] !== i) {
        parent[i] = parent[parent[i]];
        i = parent[i];
      }
      return i;
    };
    const links = this.getLinks();
    for (const link of links) {
      if (link.isElastic()) continue;
      const a = find(this.indexOf(link.start));
      const b = find(this.indexOf(link.end));
      if (a !== b) {
        parent[Math.max(a, b)] = Math.min(a, b);
      }
    }
    const rep = this.nodeIds.map((_, i) => find(i));
    const offset = positions.map((p, i) => p - positions[rep[i]]);

    for (const link of links) {
      const growth = link.growth;
      if (!link.isElastic() || growth === undefined) continue;
      const s = this.indexOf(link.start);
      const e = this.indexOf(link.end);
      if (rep[s] === rep[e]) continue;
      eqns.addGrowthLink(rep[s], rep[e], link.minSize - offset[e] + offset[s], growth);
    }

    const pins = new Map<number, BodyPin>();
    this.nodeIds.forEach((id, i) => {
      const node = this.getNode(id, 'energy');
      let pin = pins.get(rep[i]);
      if (!pin) {
        pin = {};
        pins.set(rep[i], pin);
      }
      if (node.forcedPosition !== undefined) {
        const value = node.forcedPosition - offset[i];
        if (pin.forced === undefined) {
          pin.forced = value;
        } else if (Math.abs(pin.forced - value) > 1e-9) {
          GridLogger.warn(`forced position of ${String(id)} conflicts with its rigid neighbours; ignored`);
        }
      } else if (
        node.placedPosition !== undefined &&
        (pin.lowestPlaced === undefined || node.placedPosition < pin.lowestPlaced)
      ) {
        pin.lowestPlaced = node.placedPosition;
        pin.placed = node.placedPosition - offset[i];
      }
    });
    for (const [body, pin] of pins) {
      if (pin.forced !== undefined) {
        eqns.forceValue(body, pin.forced);
      } else if (pin.placed !== undefined) {
        eqns.forceValue(body, pin.placed);
      }
    }

    for (let i = 0; i < size; i++) {
      if (rep[i] !== i) {
        eqns.tieValue(i, rep[i], offset[i]);
      }
    }
    return eqns;
  }

  /**
   * Calculate the positions that minimize the energy
   *
   * @throws SingularMatrixError if the system cannot be solved; node
   *         positions are left untouched in that case
   */
  minimizeEnergy(): void {
    if (this.nodeIds.length === 0) {
      return;
    }
    const eqns = this.createEnergyMatrix();
    eqns.solve();
    for (const [i, position] of eqns.results()) {
      this.getNode(this.nodeIds[i], 'energy').position = position;
    }
  }

  getNodePosition(id: N): number {
    return this.positionOf(id);
  }

  private positionOf(id: N): number {
    const position = this.getNode(id, 'position query').getPosition();
    if (position === undefined) {
      throw new UnresolvedPositionError(String(id));
    }
    return position;
  }

  private getNode(id: N, context: string): GridNode<N> {
    const node = this.nodes.get(id);
    if (!node) {
      throw new UnknownNodeError(String(id), context);
    }
    return node;
  }

  private indexOf(id: N): number {
    return this.getNode(id, 'index').index;
  }

  private ensureNode(id: N): GridNode<N> {
    let node = this.nodes.get(id);
    if (!node) {
      node = new GridNode(id, this.nodeIds.length);
      this.nodes.set(id, node);
      this.nodeIds.push(id);
    }
    return node;
  }

  /**
   * Kahn's algorithm: a node is queued once all of its predecessors are
   * resolved, seeded in creation order
   *
   * @throws CycleError if any node can never be resolved
   */
  private createResolutionOrder(): N[] {
    const unresolved = new Map<N, number>();
    const queue: N[] = [];
    for (const id of this.nodeIds) {
      const count = this.getNode(id, 'resolution order').linkStarts.length;
      unresolved.set(id, count);
      if (count === 0) queue.push(id);
    }

    for (let head = 0; head < queue.length; head++) {
      for (const e of this.getNode(queue[head], 'resolution order').linkEnds) {
        const remaining = (unresolved.get(e) ?? 0) - 1;
        unresolved.set(e, remaining);
        if (remaining === 0) queue.push(e);
      }
    }

    if (queue.length < this.nodeIds.length) {
      const resolved = new Set(queue);
      throw new CycleError(this.nodeIds.filter((id) => !resolved.has(id)).map(String));
    }
    return queue;
  }

  /**
   * All node ids reachable from a node (including itself)
   */
  private reachableNodes(id: N): Set<N> {
    return this.closure(id, (node) => node.linkEnds);
  }

  /**
   * All node ids that can reach a node (including itself)
   */
  private predecessorNodes(id: N): Set<N> {
    return this.closure(id, (node) => node.linkStarts);
  }

  private closure(id: N, next: (node: GridNode<N>) => N[]): Set<N> {
    const result = new Set<N>([id]);
    const toDo = [id];
    for (let current = toDo.pop(); current !== undefined; current = toDo.pop()) {
      for (const e of next(this.getNode(current, 'closure'))) {
        if (!result.has(e)) {
          result.add(e);
          toDo.push(e);
        }
      }
    }
    return result;
  }
}
