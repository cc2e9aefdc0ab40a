// ---------------------------------------------------------------------------
// Hermite spline fill with tension
// ---------------------------------------------------------------------------
// p1/p2 are the nearest points before/after the gap, p0/p3 one further out and
// only used for the tangents (p2-p0) and (p3-p1), scaled by (1 - tension).
// u = i / totalFrames runs over the requested range only, it is not stretched
// to the span between p1 and p2.

import type { CurveData, CurvePoint, FrameRange } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, createPoint } from '../curve-utils.js';
import { framesToFill, mergePoints } from './merge.js';
import { bracketGap, fillLinear } from './linear.js';

/** Hermite basis [h1, h2, h3, h4] at u with tangent scale t. */
export function hermiteBasis(u: number, t: number): [number, number, number, number] {
  const u2 = u * u;
  const u3 = u2 * u;
  return [
    2 * u3 - 3 * u2 + 1,
    -2 * u3 + 3 * u2,
    (u3 - 2 * u2 + u) * t,
    (u3 - u2) * t,
  ];
}

export function fillCubicSpline(
  curve: CurveData,
  range: FrameRange,
  tension: number,
  preserveEndpoints: boolean = true,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'fill.cubic-spline';
  const neighbours = bracketGap(curve, range, operation, diagnostics);
  if (!neighbours) return copyCurve(curve);

  const { before, after } = neighbours;
  if (before.length < 2 || after.length < 2) {
    diagnostics?.report({
      code: 'method-fallback',
      operation,
      message: 'Spline needs two points on each side of the gap, using linear fill',
    });
    return fillLinear(curve, range, preserveEndpoints, diagnostics);
  }

  const p0 = before[1]!;
  const p1 = before[0]!;
  const p2 = after[0]!;
  const p3 = after[1]!;
  const totalFrames = range.endFrame - range.startFrame + 1;
  const t = 1 - tension;

  const generated = framesToFill(range, neighbours.existingFrames, preserveEndpoints).map((frame) => {
    const u = (frame - range.startFrame) / totalFrames;
    const [h1, h2, h3, h4] = hermiteBasis(u, t);
    const x = h1 * p1.x + h2 * p2.x + h3 * (p2.x - p0.x) + h4 * (p3.x - p1.x);
    const y = h1 * p1.y + h2 * p2.y + h3 * (p2.y - p0.y) + h4 * (p3.y - p1.y);
    return createPoint(frame, x, y, 'interpolated');
  });
  return mergePoints(curve, generated);
}
