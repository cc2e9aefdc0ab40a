import type { CurveData, CurvePoint, IndexSet, SmoothingParams } from '@curvekit/types';
import { assertNever } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { smoothMovingAverage } from './moving-average.js';
import { smoothGaussian } from './gaussian.js';
import { smoothSavitzkyGolay } from './savitzky-golay.js';

/** Smooth the selected points with the given method. */
export function smooth(
  curve: CurveData,
  indices: IndexSet,
  params: SmoothingParams,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  switch (params.method) {
    case 'moving-average':
      return smoothMovingAverage(curve, indices, params.windowSize, diagnostics);
    case 'gaussian':
      return smoothGaussian(curve, indices, params.windowSize, params.sigma, diagnostics);
    case 'savitzky-golay':
      return smoothSavitzkyGolay(curve, indices, params.windowSize, diagnostics);
    default:
      return assertNever(params);
  }
}
