import type { CurveData, CurvePoint, FilterParams, IndexSet } from '@curvekit/types';
import { assertNever } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { smoothMovingAverage } from '../smoothing/moving-average.js';
import { smoothGaussian } from '../smoothing/gaussian.js';
import { filterMedian } from './median.js';
import { filterButterworth } from './butterworth.js';

/** Moving average under its filter name. */
export function filterAverage(
  curve: CurveData,
  indices: IndexSet,
  windowSize: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  return smoothMovingAverage(curve, indices, windowSize, diagnostics, 'filter.average');
}

/** Gaussian smoothing under its filter name. */
export function filterGaussian(
  curve: CurveData,
  indices: IndexSet,
  windowSize: number,
  sigma: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  return smoothGaussian(curve, indices, windowSize, sigma, diagnostics, 'filter.gaussian');
}

/** Filter the selected points with the given method. */
export function filter(
  curve: CurveData,
  indices: IndexSet,
  params: FilterParams,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  switch (params.method) {
    case 'median':
      return filterMedian(curve, indices, params.windowSize, diagnostics);
    case 'average':
      return filterAverage(curve, indices, params.windowSize, diagnostics);
    case 'gaussian':
      return filterGaussian(curve, indices, params.windowSize, params.sigma, diagnostics);
    case 'butterworth':
      return filterButterworth(curve, indices, params.cutoff, params.order, diagnostics);
    default:
      return assertNever(params);
  }
}
