import { Range } from './range.js';

/**
 * Axis-aligned bounding box built from one Range per axis
 */
export class BBox {
  constructor(
    public readonly x: Range,
    public readonly y: Range
  ) {}

  static none(): BBox {
    return new BBox(Range.none(), Range.none());
  }

  static ofRanges(x: Range, y: Range): BBox {
    return new BBox(x, y);
  }

  static fromCorners(x0: number, y0: number, x1: number, y1: number): BBox {
    return new BBox(Range.ofPoints(x0, x1), Range.ofPoints(y0, y1));
  }

  isNone(): boolean {
    return this.x.isNone() || this.y.isNone();
  }

  union(other: BBox): BBox {
    if (this.isNone()) return other;
    if (other.isNone()) return this;
    return new BBox(this.x.union(other.x), this.y.union(other.y));
  }

  /**
   * Center and size as [cx, cy, width, height]
   */
  getCwh(): [number, number, number, number] {
    return [this.x.center(), this.y.center(), this.x.size(), this.y.size()];
  }

  toString(): string {
    return `[${this.x} x ${this.y}]`;
  }
}
