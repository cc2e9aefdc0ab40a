// ---------------------------------------------------------------------------
// Velocity normalization and smoothness adjustment
// ---------------------------------------------------------------------------

import type { CurveData, CurvePoint, IndexSet } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, distance, movePoint, selectIndices } from '../curve-utils.js';
import { smoothMovingAverage } from '../smoothing/moving-average.js';

const MAX_SMOOTHNESS_WINDOW_GROWTH = 12;

/**
 * Respace a contiguous run of points so every segment moves at the same
 * per-frame speed. The first selected point stays fixed; each following point
 * keeps its original direction from its predecessor.
 *
 * The target defaults to the mean segment speed of the run. Non-contiguous,
 * single-point and non-positive-target requests leave the curve unchanged.
 */
export function normalizeVelocity(
  curve: CurveData,
  indices: IndexSet,
  targetVelocity?: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'transform.normalize-velocity';
  const out = copyCurve(curve);
  const selected = [...new Set(indices)].sort((a, b) => a - b);
  const valid = selectIndices(selected, curve.length, operation);

  if (valid.length !== selected.length || valid.length < 2) {
    diagnostics?.report({
      code: 'invalid-selection',
      operation,
      message: `Need at least two in-range indices, got ${valid.length} of ${selected.length}`,
    });
    return out;
  }
  const first = valid[0]!;
  const last = valid[valid.length - 1]!;
  if (last - first + 1 !== valid.length) {
    diagnostics?.report({
      code: 'invalid-selection',
      operation,
      message: `Indices ${first}..${last} are not contiguous`,
    });
    return out;
  }

  let speedSum = 0;
  let speedCount = 0;
  for (let i = first + 1; i <= last; i++) {
    const dt = Math.abs(curve[i]!.frame - curve[i - 1]!.frame);
    if (dt === 0) continue;
    speedSum += distance(curve[i - 1]!, curve[i]!) / dt;
    speedCount++;
  }

  const target = targetVelocity ?? (speedCount > 0 ? speedSum / speedCount : 0);
  if (!(target > 0)) {
    diagnostics?.report({
      code: 'parameter-out-of-range',
      operation,
      message: `Target velocity ${target} must be positive`,
    });
    return out;
  }

  for (let i = first + 1; i <= last; i++) {
    const origPrev = curve[i - 1]!;
    const orig = curve[i]!;
    const placedPrev = out[i - 1]!;
    const len = distance(origPrev, orig);
    if (len === 0) {
      out[i] = movePoint(orig, placedPrev.x, placedPrev.y);
      continue;
    }
    const step = (target * Math.abs(orig.frame - origPrev.frame)) / len;
    out[i] = movePoint(
      orig,
      placedPrev.x + (orig.x - origPrev.x) * step,
      placedPrev.y + (orig.y - origPrev.y) * step,
    );
  }
  return out;
}

/**
 * Moving-average smoothing whose window grows with `factor` in `[0, 1]`:
 * 0 leaves the curve as is, 1 uses a 15-point window.
 */
export function adjustSmoothness(
  curve: CurveData,
  indices: IndexSet,
  factor: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'transform.adjust-smoothness';
  const clamped = Math.min(1, Math.max(0, factor));
  if (clamped !== factor) {
    diagnostics?.report({
      code: 'parameter-out-of-range',
      operation,
      message: `Smoothness factor ${factor} clamped to ${clamped}`,
    });
  }
  if (clamped === 0) return copyCurve(curve);

  let windowSize = 3 + Math.floor(MAX_SMOOTHNESS_WINDOW_GROWTH * clamped);
  if (windowSize % 2 === 0) windowSize += 1;
  return smoothMovingAverage(curve, indices, windowSize, diagnostics, operation);
}
