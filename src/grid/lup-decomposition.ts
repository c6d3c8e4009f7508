/**
 * LUP Decomposition
 *
 * Dense LU decomposition with partial pivoting of a square matrix held
 * row-major in a flat array, and inversion through it.
 *
 * After decomposition `P . M = L . U`, where:
 * - L is unit lower triangular (its 1s on the diagonal are implicit)
 * - U is upper triangular
 * - P is the row permutation held in `pivot`; row i of P.M is row pivot[i] of M
 *
 * L and U share one array since their non-implicit entries do not overlap.
 *
 * TEST: tests/unit/grid/lup-decomposition.test.ts
 */
export class LUPDecomposition {
  private constructor(
    public readonly size: number,
    public readonly data: number[],
    public readonly pivot: number[]
  ) {}

  /**
   * Decompose a size x size matrix
   *
   * Pivots are chosen by magnitude relative to the largest entry of their
   * original row. Returns null if the matrix is singular: a zero row, or a
   * pivot column with no relative magnitude above `epsilon`.
   */
  static create(matrix: readonly number[], size: number, epsilon = 0): LUPDecomposition | null {
    if (size <= 0) {
      throw new RangeError(`LUP decomposition needs a non-empty matrix, got size ${size}`);
    }
    if (matrix.length !== size * size) {
      throw new RangeError(`Matrix has ${matrix.length} entries, expected ${size * size}`);
    }
    const data = matrix.slice();
    const pivot = decompose(data, size, epsilon);
    return pivot ? new LUPDecomposition(size, data, pivot) : null;
  }

  /**
   * Lower matrix: 1 on the diagonal, 0 above it
   */
  getL(): number[] {
    const size = this.size;
    const result = this.data.slice();
    for (let r = 0; r < size; r++) {
      for (let c = r; c < size; c++) {
        result[r * size + c] = c === r ? 1 : 0;
      }
    }
    return result;
  }

  /**
   * Upper matrix: 0 below the diagonal
   */
  getU(): number[] {
    const size = this.size;
    const result = this.data.slice();
    for (let r = 1; r < size; r++) {
      for (let c = 0; c < r; c++) {
        result[r * size + c] = 0;
      }
    }
    return result;
  }

  /**
   * Rows of the decomposed data reordered by the pivot vector
   */
  unpivot(): number[] {
    const size = this.size;
    const result = this.data.slice();
    for (let r = 0; r < size; r++) {
      const pr = this.pivot[r];
      for (let c = 0; c < size; c++) {
        result[r * size + c] = this.data[pr * size + c];
      }
    }
    return result;
  }

  /**
   * Write the inverse of the decomposed matrix into `result`
   *
   * For each column c, solve L.y = I(c) by forward substitution and then
   * U.x = y by back substitution; x is column pivot[c] of the inverse.
   *
   * Returns false if U has a zero on its diagonal.
   */
  invert(result: number[]): boolean {
    const size = this.size;
    if (result.length !== size * size) {
      throw new RangeError(`Result has ${result.length} entries, expected ${size * size}`);
    }
    const y = new Array<number>(size).fill(0);
    const x = new Array<number>(size).fill(0);

    for (let c = 0; c < size; c++) {
      for (let r = 0; r < size; r++) {
        let sum = r === c ? 1 : 0;
        for (let k = 0; k < r; k++) {
          sum -= this.data[r * size + k] * y[k];
        }
        y[r] = sum;
      }

      for (let r = size - 1; r >= 0; r--) {
        const diagonal = this.data[r * size + r];
        if (diagonal === 0) {
          return false;
        }
        let sum = y[r];
        for (let k = r + 1; k < size; k++) {
          sum -= this.data[r * size + k] * x[k];
        }
        x[r] = sum / diagonal;
      }

      const column = this.pivot[c];
      for (let r = 0; r < size; r++) {
        result[r * size + column] = x[r];
      }
    }
    return true;
  }
}

/**
 * Decompose in place, returning the pivot permutation or null if singular
 */
function decompose(matrix: number[], size: number, epsilon: number): number[] | null {
  const permute = Array.from({ length: size }, (_, i) => i);

  // Largest magnitude of each row, so pivots are compared relative to their row
  const scale = new Array<number>(size).fill(0);
  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      scale[r] = Math.max(scale[r], Math.abs(matrix[r * size + c]));
    }
    if (scale[r] === 0) {
      return null;
    }
  }

  for (let d = 0; d < size; d++) {
    // Row with the largest scaled magnitude in column d
    let vMax = 0;
    let rMax = -1;
    for (let r = d; r < size; r++) {
      const t = Math.abs(matrix[r * size + d]) / scale[r];
      if (t > vMax) {
        vMax = t;
        rMax = r;
      }
    }
    if (rMax < 0 || vMax <= epsilon) {
      return null;
    }

    if (rMax !== d) {
      [permute[rMax], permute[d]] = [permute[d], permute[rMax]];
      [scale[rMax], scale[d]] = [scale[d], scale[rMax]];
      for (let c = 0; c < size; c++) {
        const t = matrix[rMax * size + c];
        matrix[rMax * size + c] = matrix[d * size + c];
        matrix[d * size + c] = t;
      }
    }

    for (let r = d + 1; r < size; r++) {
      const factor = matrix[r * size + d] / matrix[d * size + d];
      matrix[r * size + d] = factor;
      for (let c = d + 1; c < size; c++) {
        matrix[r * size + c] -= factor * matrix[d * size + c];
      }
    }
  }
  return permute;
}
