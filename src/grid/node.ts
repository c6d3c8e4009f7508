import { NodeId } from './types.js';

/**
 * A node in one grid dimension: in essence a border between cells
 *
 * Adjacency is held as node ids rather than references; the resolver owns
 * every node and link in Maps keyed by id.
 */
export class GridNode<N extends NodeId = NodeId> {
  /** Forced (pinned) position; wins over everything else */
  forcedPosition: number | undefined;

  /**
   * Placed position, assigned during boundary placement
   *
   * Cleared before every placement pass.
   */
  placedPosition: number | undefined;

  /** Position derived by the minimum-size sweep or the energy solve */
  position: number | undefined;

  /** Ids of the starts of links for which this node is the end */
  readonly linkStarts: N[] = [];

  /** Ids of the ends of links for which this node is the start */
  readonly linkEnds: N[] = [];

  constructor(
    public readonly id: N,
    public readonly index: number
  ) {}

  /**
   * The id must not already be in the list
   */
  addStartpoint(start: N): void {
    this.linkStarts.push(start);
  }

  /**
   * The id must not already be in the list
   */
  addEndpoint(end: N): void {
    this.linkEnds.push(end);
  }

  isRoot(): boolean {
    return this.linkStarts.length === 0;
  }

  isLeaf(): boolean {
    return this.linkEnds.length === 0;
  }

  /**
   * True if the node is placed or forced
   */
  isPlaced(): boolean {
    return this.forcedPosition !== undefined || this.placedPosition !== undefined;
  }

  hasPosition(): boolean {
    return this.getPosition() !== undefined;
  }

  /**
   * Forced position first, then the derived one, then the placement target
   */
  getPosition(): number | undefined {
    return this.forcedPosition ?? this.position ?? this.placedPosition;
  }

  resetPosition(): void {
    this.position = undefined;
  }
}
