/**
 * Range - a closed interval along one axis
 *
 * Immutable value type; every operation returns a new Range. The empty
 * range is represented by min > max and is produced by Range.none().
 */
export class Range {
  constructor(
    public readonly min: number,
    public readonly max: number
  ) {}

  static none(): Range {
    return new Range(Infinity, -Infinity);
  }

  /**
   * Range covering two points in either order
   */
  static ofPoints(a: number, b: number): Range {
    return a < b ? new Range(a, b) : new Range(b, a);
  }

  isNone(): boolean {
    return this.min > this.max;
  }

  size(): number {
    return this.isNone() ? 0 : this.max - this.min;
  }

  center(): number {
    return this.isNone() ? 0 : (this.min + this.max) / 2;
  }

  include(x: number): Range {
    if (this.isNone()) {
      return new Range(x, x);
    }
    return new Range(Math.min(this.min, x), Math.max(this.max, x));
  }

  union(other: Range): Range {
    if (this.isNone()) return other;
    if (other.isNone()) return this;
    return new Range(Math.min(this.min, other.min), Math.max(this.max, other.max));
  }

  intersect(other: Range): Range {
    if (this.isNone() || other.isNone()) {
      return Range.none();
    }
    return new Range(Math.max(this.min, other.min), Math.min(this.max, other.max));
  }

  add(delta: number): Range {
    return this.isNone() ? this : new Range(this.min + delta, this.max + delta);
  }

  sub(delta: number): Range {
    return this.add(-delta);
  }

  /**
   * Grow by value at both ends
   */
  enlarge(value: number): Range {
    return this.isNone() ? this : new Range(this.min - value, this.max + value);
  }

  /**
   * Shrink by value at both ends, collapsing to the center if too small
   */
  reduce(value: number): Range {
    if (this.isNone()) return this;
    if (this.size() < 2 * value) {
      const c = this.center();
      return new Range(c, c);
    }
    return new Range(this.min + value, this.max - value);
  }

  toString(): string {
    return this.isNone() ? '(none)' : `(${this.min} to ${this.max})`;
  }
}
