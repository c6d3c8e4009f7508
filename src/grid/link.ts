import { NodeId } from './types.js';

/**
 * A minimum-size constraint between two grid nodes
 *
 * A link is elastic when it carries a growth factor greater than zero; all
 * other links keep the gap they are given by the minimum-size sweep.
 */
export class Link<N extends NodeId = NodeId> {
  private growthFactor: number | undefined;

  constructor(
    public readonly start: N,
    public readonly end: N,
    private size: number
  ) {}

  get minSize(): number {
    return this.size;
  }

  get growth(): number | undefined {
    return this.growthFactor;
  }

  /**
   * Make the link at least as large as minSize
   */
  union(minSize: number): void {
    if (minSize > this.size) {
      this.size = minSize;
    }
  }

  setGrowth(growth: number): void {
    this.growthFactor = growth;
  }

  isElastic(): boolean {
    return this.growthFactor !== undefined && this.growthFactor > 0;
  }

  toString(): string {
    const growth = this.growthFactor === undefined ? '' : `+${this.growthFactor}`;
    return `${this.start}->${this.end}:${this.size}${growth}`;
  }
}
