// ---------------------------------------------------------------------------
// Median filter
// ---------------------------------------------------------------------------
// Robust nonlinear filter: removes single-frame spikes without smearing steps.
// x and y are sorted independently; the element at floor(len/2) is taken, so
// even-length (clamped) windows use the upper middle value.

import type { CurveData, CurvePoint, IndexSet } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, extractAxes, movePoint, selectIndices, windowBounds } from '../curve-utils.js';
import { MIN_WINDOW } from '../smoothing/moving-average.js';

/** Median of the values, upper middle for even lengths. Sorts in place. */
export function upperMedian(values: Float64Array): number {
  values.sort();
  return values[Math.floor(values.length / 2)]!;
}

export function filterMedian(
  curve: CurveData,
  indices: IndexSet,
  windowSize: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'filter.median';
  const result = copyCurve(curve);
  if (windowSize < MIN_WINDOW) {
    diagnostics?.report({
      code: 'insufficient-data',
      operation,
      message: `Window size ${windowSize} is below the minimum of ${MIN_WINDOW}`,
    });
    return result;
  }

  const half = Math.floor(windowSize / 2);
  for (const idx of selectIndices(indices, curve.length, operation, diagnostics)) {
    const [start, end] = windowBounds(idx, half, curve.length);
    if (end - start < 2) {
      diagnostics?.report(
        { code: 'insufficient-data', operation, index: idx, message: 'Clamped window holds fewer than 3 points' },
        'debug',
      );
      continue;
    }
    const { xs, ys } = extractAxes(curve, start, end);
    result[idx] = movePoint(curve[idx]!, upperMedian(xs), upperMedian(ys));
  }
  return result;
}
