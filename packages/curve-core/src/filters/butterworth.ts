// ---------------------------------------------------------------------------
// Simplified Butterworth low-pass
// ---------------------------------------------------------------------------
// Not a designed Butterworth filter: a one-pole IIR whose smoothing factor is
// taken from the Butterworth magnitude response,
//   α = 1 / (1 + (1/cutoff)^(2·order))
// run forward and then backward over its own output to cancel the phase lag
// (the same idea as filtfilt).

import type { CurveData, CurvePoint, IndexSet } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, extractAxes, movePoint, selectIndices } from '../curve-utils.js';

export function butterworthAlpha(cutoff: number, order: number): number {
  return 1 / (1 + Math.pow(1 / cutoff, 2 * order));
}

/**
 * Forward-backward one-pole low-pass over a 1D sequence.
 * out[0] = in[0]; out[i] = α·in[i] + (1-α)·out[i-1]; then for i = n-2..0
 * out[i] = α·out[i] + (1-α)·out[i+1].
 */
export function butterworthLowpass(values: ArrayLike<number>, cutoff: number, order: number): Float64Array {
  const n = values.length;
  const out = new Float64Array(n);
  if (n === 0) return out;

  const alpha = butterworthAlpha(cutoff, order);
  out[0] = values[0]!;
  for (let i = 1; i < n; i++) {
    out[i] = alpha * values[i]! + (1 - alpha) * out[i - 1]!;
  }
  for (let i = n - 2; i >= 0; i--) {
    out[i] = alpha * out[i]! + (1 - alpha) * out[i + 1]!;
  }
  return out;
}

/**
 * Filter the selected points. The pass runs over the whole contiguous range
 * [min(indices), max(indices)] for context; only selected points change.
 */
export function filterButterworth(
  curve: CurveData,
  indices: IndexSet,
  cutoff: number,
  order: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'filter.butterworth';
  const result = copyCurve(curve);
  const selected = selectIndices(indices, curve.length, operation, diagnostics);
  if (selected.length < 3) {
    diagnostics?.report({
      code: 'insufficient-data',
      operation,
      message: `Butterworth filtering needs at least 3 selected points, got ${selected.length}`,
    });
    return result;
  }

  let lo = selected[0]!;
  let hi = lo;
  for (const idx of selected) {
    if (idx < lo) lo = idx;
    if (idx > hi) hi = idx;
  }
  const { xs, ys } = extractAxes(curve, lo, hi);
  const fx = butterworthLowpass(xs, cutoff, order);
  const fy = butterworthLowpass(ys, cutoff, order);

  for (const idx of selected) {
    result[idx] = movePoint(curve[idx]!, fx[idx - lo]!, fy[idx - lo]!);
  }
  return result;
}
