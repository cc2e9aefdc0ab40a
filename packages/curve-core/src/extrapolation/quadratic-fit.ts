// ---------------------------------------------------------------------------
// Least-squares quadratic fit y = c0 + c1·x + c2·x²
// ---------------------------------------------------------------------------
// Normal equations solved by Gaussian elimination with partial pivoting.

export const PIVOT_EPSILON = 1e-10;

/**
 * Fit a parabola to the samples. Returns `[c0, c1, c2]`, constant first, or
 * `null` when fewer than three samples are given or the system is singular.
 */
export function fitQuadratic(xs: ArrayLike<number>, ys: ArrayLike<number>): [number, number, number] | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 3) return null;

  let sx = 0, sx2 = 0, sx3 = 0, sx4 = 0;
  let sy = 0, sxy = 0, sx2y = 0;
  for (let i = 0; i < n; i++) {
    const x = xs[i]!;
    const y = ys[i]!;
    const x2 = x * x;
    sx += x;
    sx2 += x2;
    sx3 += x2 * x;
    sx4 += x2 * x2;
    sy += y;
    sxy += x * y;
    sx2y += x2 * y;
  }

  // Augmented matrix rows: [n Σx Σx² | Σy] ...
  const m: number[][] = [
    [n, sx, sx2, sy],
    [sx, sx2, sx3, sxy],
    [sx2, sx3, sx4, sx2y],
  ];

  for (let col = 0; col < 3; col++) {
    let pivotRow = col;
    for (let r = col + 1; r < 3; r++) {
      if (Math.abs(m[r]![col]!) > Math.abs(m[pivotRow]![col]!)) pivotRow = r;
    }
    if (Math.abs(m[pivotRow]![col]!) < PIVOT_EPSILON) return null;
    if (pivotRow !== col) {
      const tmp = m[col]!;
      m[col] = m[pivotRow]!;
      m[pivotRow] = tmp;
    }
    const pivot = m[col]!;
    for (let r = col + 1; r < 3; r++) {
      const row = m[r]!;
      const factor = row[col]! / pivot[col]!;
      for (let c = col; c < 4; c++) row[c] = row[c]! - factor * pivot[c]!;
    }
  }

  const coeffs: [number, number, number] = [0, 0, 0];
  for (let r = 2; r >= 0; r--) {
    const row = m[r]!;
    let acc = row[3]!;
    for (let c = r + 1; c < 3; c++) acc -= row[c]! * coeffs[c]!;
    coeffs[r] = acc / row[r]!;
  }
  return coeffs;
}
