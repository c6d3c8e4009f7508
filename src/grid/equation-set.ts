/**
 * Equation Set - Spring Energy Linear System
 *
 * The energy of a spring with ends at `a` and `b`, natural length `L` and
 * elasticity (growth) `g` is:
 *
 *   ((b - a) - L)^2 / g
 *
 * Its gradient is proportional to (a - b + L) / g for `a` and
 * (b - a - L) / g for `b`. The network is at minimum energy where every
 * gradient sum is zero, which is linear in the positions: one row per node.
 *
 * Springs alone can be translated freely without changing the energy, so at
 * least one position must be pinned with forceValue; pinning a second one
 * stretches the network between the two.
 *
 * TEST: tests/unit/grid/equation-set.test.ts
 */

import { LUPDecomposition } from './lup-decomposition.js';
import { SingularMatrixError } from './errors.js';
import { GRID_PIVOT_EPSILON } from '../shared/config.js';

export class EquationSet {
  /** Coefficients, row-major size*size; holds the inverse after invert() */
  private matrix: number[];

  /** Right-hand side; holds the solution after solve() */
  private values: number[];

  constructor(
    public readonly size: number,
    private readonly epsilon: number = GRID_PIVOT_EPSILON
  ) {
    this.matrix = new Array<number>(size * size).fill(0);
    this.values = new Array<number>(size).fill(0);
  }

  /**
   * Add a spring between two unknowns
   */
  addGrowthLink(start: number, end: number, length: number, growth: number): void {
    if (!(growth > 0)) {
      throw new RangeError(`Growth must be greater than zero, got ${growth}`);
    }
    const size = this.size;
    const stiffness = 1 / growth;

    this.matrix[start * size + start] += stiffness;
    this.matrix[start * size + end] -= stiffness;
    this.values[start] -= stiffness * length;

    this.matrix[end * size + start] -= stiffness;
    this.matrix[end * size + end] += stiffness;
    this.values[end] += stiffness * length;
  }

  /**
   * Force unknown n to a value: row n becomes 0 .. 1 .. 0 = value
   */
  forceValue(n: number, value: number): void {
    this.clearRow(n);
    this.matrix[n * this.size + n] = 1;
    this.values[n] = value;
  }

  /**
   * Tie unknown n to another: row n becomes x_n - x_to = offset
   */
  tieValue(n: number, to: number, offset: number): void {
    this.clearRow(n);
    this.matrix[n * this.size + n] = 1;
    this.matrix[n * this.size + to] -= 1;
    this.values[n] = offset;
  }

  rowIsZero(n: number): boolean {
    for (let i = 0; i < this.size; i++) {
      if (this.matrix[n * this.size + i] !== 0) {
        return false;
      }
    }
    return true;
  }

  columnIsZero(n: number): boolean {
    for (let i = 0; i < this.size; i++) {
      if (this.matrix[i * this.size + n] !== 0) {
        return false;
      }
    }
    return true;
  }

  /**
   * Replace the matrix with its inverse
   *
   * An equation set that cannot be inverted is over- or under-constrained.
   */
  invert(): void {
    if (this.size === 0) {
      return;
    }
    const lup = LUPDecomposition.create(this.matrix, this.size, this.epsilon);
    if (!lup) {
      throw new SingularMatrixError('failed to decompose, not invertible');
    }
    if (!lup.invert(this.matrix)) {
      throw new SingularMatrixError('failed to invert after decomposition, not invertible');
    }
  }

  /**
   * Solve for every unknown
   */
  solve(): void {
    this.invert();
    const size = this.size;
    const results: number[] = [];
    for (let n = 0; n < size; n++) {
      let x = 0;
      for (let j = 0; j < size; j++) {
        x += this.matrix[n * size + j] * this.values[j];
      }
      if (!Number.isFinite(x)) {
        throw new SingularMatrixError(`solution for unknown ${n} is not finite`);
      }
      results.push(x);
    }
    this.values = results;
  }

  /**
   * [index, value] pairs; the solution once solve() has run
   */
  results(): IterableIterator<[number, number]> {
    return this.values.entries();
  }

  toString(): string {
    const lines: string[] = [];
    for (let i = 0; i < this.size; i++) {
      const row = this.matrix
        .slice(i * this.size, (i + 1) * this.size)
        .map((v) => v.toFixed(4).padStart(10))
        .join(' ');
      lines.push(`|${row} |  (${this.values[i].toFixed(4).padStart(10)})`);
    }
    return lines.join('\n');
  }

  private clearRow(n: number): void {
    this.matrix.fill(0, n * this.size, (n + 1) * this.size);
  }
}
