// ---------------------------------------------------------------------------
// Savitzky-Golay smoothing (quadratic, per point)
// ---------------------------------------------------------------------------
// Least-squares fit y = a + b·t + c·t² over the window, t = 0..n-1 being the
// position inside the window, evaluated at the target's position. The 3×3
// normal equations are solved in closed form by Cramer's rule.

import type { CurveData, CurvePoint, IndexSet } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, extractAxes, movePoint, selectIndices, windowBounds } from '../curve-utils.js';

export const SG_MIN_WINDOW = 5;
export const SINGULAR_EPSILON = 1e-10;

function det3(
  a11: number, a12: number, a13: number,
  a21: number, a22: number, a23: number,
  a31: number, a32: number, a33: number,
): number {
  return (
    a11 * (a22 * a33 - a23 * a32) -
    a12 * (a21 * a33 - a23 * a31) +
    a13 * (a21 * a32 - a22 * a31)
  );
}

/**
 * Fit a quadratic to `values` against t = 0..n-1 and evaluate it at
 * `targetIndex`. Returns `null` when the normal matrix is near singular.
 */
export function savitzkyGolayFit(values: ArrayLike<number>, targetIndex: number): number | null {
  const n = values.length;
  if (n < 3) return null;

  let sT = 0, sT2 = 0, sT3 = 0, sT4 = 0;
  let sY = 0, sTY = 0, sT2Y = 0;
  for (let t = 0; t < n; t++) {
    const y = values[t]!;
    const t2 = t * t;
    sT += t;
    sT2 += t2;
    sT3 += t2 * t;
    sT4 += t2 * t2;
    sY += y;
    sTY += t * y;
    sT2Y += t2 * y;
  }

  const det = det3(
    n, sT, sT2,
    sT, sT2, sT3,
    sT2, sT3, sT4,
  );
  if (Math.abs(det) < SINGULAR_EPSILON) return null;

  const a = det3(
    sY, sT, sT2,
    sTY, sT2, sT3,
    sT2Y, sT3, sT4,
  ) / det;
  const b = det3(
    n, sY, sT2,
    sT, sTY, sT3,
    sT2, sT2Y, sT4,
  ) / det;
  const c = det3(
    n, sT, sY,
    sT, sT2, sTY,
    sT2, sT3, sT2Y,
  ) / det;

  return a + b * targetIndex + c * targetIndex * targetIndex;
}

export function smoothSavitzkyGolay(
  curve: CurveData,
  indices: IndexSet,
  windowSize: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'smooth.savitzky-golay';
  const result = copyCurve(curve);
  if (windowSize < SG_MIN_WINDOW) {
    diagnostics?.report({
      code: 'insufficient-data',
      operation,
      message: `Window size ${windowSize} is below the minimum of ${SG_MIN_WINDOW}`,
    });
    return result;
  }

  const half = Math.floor(windowSize / 2);
  for (const idx of selectIndices(indices, curve.length, operation, diagnostics)) {
    const [start, end] = windowBounds(idx, half, curve.length);
    if (end - start < SG_MIN_WINDOW - 1) {
      diagnostics?.report(
        { code: 'insufficient-data', operation, index: idx, message: 'Clamped window holds fewer than 5 points' },
        'debug',
      );
      continue;
    }

    const { xs, ys } = extractAxes(curve, start, end);
    const rel = idx - start;
    const x = savitzkyGolayFit(xs, rel);
    const y = savitzkyGolayFit(ys, rel);
    if (x === null || y === null) {
      diagnostics?.report(
        { code: 'degenerate-fit', operation, index: idx, message: 'Normal matrix is near singular, point kept' },
        'debug',
      );
      continue;
    }
    result[idx] = movePoint(curve[idx]!, x, y);
  }
  return result;
}
