// ---------------------------------------------------------------------------
// Gaussian-weighted smoothing
// ---------------------------------------------------------------------------
// w_k = exp(-k²/(2σ²)), k ∈ [-half, half], normalized over the full window.
// Where the window is clamped at either end of the curve only the overlapping
// weights are applied, divided by their partial sum.

import type { CurveData, CurvePoint, IndexSet } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, movePoint, selectIndices, windowBounds } from '../curve-utils.js';
import { MIN_WINDOW } from './moving-average.js';

/** Normalized kernel of length 2·floor(windowSize/2)+1. */
export function gaussianWeights(windowSize: number, sigma: number): Float64Array {
  const half = Math.floor(windowSize / 2);
  const weights = new Float64Array(2 * half + 1);
  let sum = 0;
  for (let k = -half; k <= half; k++) {
    const w = Math.exp(-(k * k) / (2 * sigma * sigma));
    weights[k + half] = w;
    sum += w;
  }
  for (let i = 0; i < weights.length; i++) weights[i] = weights[i]! / sum;
  return weights;
}

export function smoothGaussian(
  curve: CurveData,
  indices: IndexSet,
  windowSize: number,
  sigma: number,
  diagnostics?: DiagnosticLog,
  operation: string = 'smooth.gaussian',
): CurvePoint[] {
  const result = copyCurve(curve);
  if (windowSize < MIN_WINDOW) {
    diagnostics?.report({
      code: 'insufficient-data',
      operation,
      message: `Window size ${windowSize} is below the minimum of ${MIN_WINDOW}`,
    });
    return result;
  }
  if (!(sigma > 0)) {
    diagnostics?.report({
      code: 'parameter-out-of-range',
      operation,
      message: `Sigma must be positive, got ${sigma}`,
    });
    return result;
  }

  const half = Math.floor(windowSize / 2);
  const weights = gaussianWeights(windowSize, sigma);

  for (const idx of selectIndices(indices, curve.length, operation, diagnostics)) {
    const [start, end] = windowBounds(idx, half, curve.length);
    if (end - start < 2) {
      diagnostics?.report(
        { code: 'insufficient-data', operation, index: idx, message: 'Clamped window holds fewer than 3 points' },
        'debug',
      );
      continue;
    }

    // Offset of the clamped window inside the kernel
    const shift = idx - half;
    let wx = 0;
    let wy = 0;
    let wSum = 0;
    for (let i = start; i <= end; i++) {
      const w = weights[i - shift]!;
      wx += curve[i]!.x * w;
      wy += curve[i]!.y * w;
      wSum += w;
    }
    result[idx] = movePoint(curve[idx]!, wx / wSum, wy / wSum);
  }
  return result;
}
