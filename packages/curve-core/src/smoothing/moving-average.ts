// ---------------------------------------------------------------------------
// Moving-average smoothing
// ---------------------------------------------------------------------------
// Unweighted mean over [i-half, i+half], clamped to the curve. A point whose
// clamped window holds fewer than 3 samples is left as it is.

import type { CurveData, CurvePoint, IndexSet } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, movePoint, selectIndices, windowBounds } from '../curve-utils.js';

export const MIN_WINDOW = 3;

export function smoothMovingAverage(
  curve: CurveData,
  indices: IndexSet,
  windowSize: number,
  diagnostics?: DiagnosticLog,
  operation: string = 'smooth.moving-average',
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

    let sumX = 0;
    let sumY = 0;
    for (let i = start; i <= end; i++) {
      sumX += curve[i]!.x;
      sumY += curve[i]!.y;
    }
    const count = end - start + 1;
    result[idx] = movePoint(curve[idx]!, sumX / count, sumY / count);
  }
  return result;
}
