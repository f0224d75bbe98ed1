/**
 * Dense linear solve with partial pivoting. Used for the small boundary
 * condition systems of the deflection solver.
 */
export function solveLinearSystem(A: number[][], b: number[]): number[] {
  const n = A.length;

  if (A.some(row => row.length !== n)) {
    throw new Error('Matrix must be square');
  }
  if (b.length !== n) {
    throw new Error('Vector length must match matrix size');
  }

  // Augmented matrix [A|b]
  const aug = A.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < n; col++) {
    let maxRow = col;
    let maxVal = Math.abs(aug[col][col]);
    for (let row = col + 1; row < n; row++) {
      const val = Math.abs(aug[row][col]);
      if (val > maxVal) {
        maxVal = val;
        maxRow = row;
      }
    }

    if (maxVal < 1e-12) {
      throw new Error(`Matrix is singular or nearly singular at column ${col}`);
    }

    if (maxRow !== col) {
      [aug[col], aug[maxRow]] = [aug[maxRow], aug[col]];
    }

    for (let row = col + 1; row < n; row++) {
      const factor = aug[row][col] / aug[col][col];
      for (let j = col; j <= n; j++) {
        aug[row][j] -= factor * aug[col][j];
      }
    }
  }

  // Back substitution
  const x: number[] = new Array(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = aug[i][n];
    for (let j = i + 1; j < n; j++) {
      sum -= aug[i][j] * x[j];
    }
    x[i] = sum / aug[i][i];
  }

  return x;
}
