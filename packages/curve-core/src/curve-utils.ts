// ---------------------------------------------------------------------------
// Point helpers shared by every operation
// ---------------------------------------------------------------------------
// Outputs are always freshly allocated: operations copy the curve up front and
// replace individual entries, so no caller-owned object escapes into a result.

import type { CurveData, CurvePoint, IndexSet, PointStatus, Vec2 } from '@curvekit/types';
import type { DiagnosticLog } from './diagnostics.js';

export function clonePoint(point: CurvePoint): CurvePoint {
  return point.status === undefined
    ? { frame: point.frame, x: point.x, y: point.y }
    : { frame: point.frame, x: point.x, y: point.y, status: point.status };
}

export function copyCurve(curve: CurveData): CurvePoint[] {
  return curve.map(clonePoint);
}

/** Same frame and status, new position. */
export function movePoint(point: CurvePoint, x: number, y: number): CurvePoint {
  return point.status === undefined
    ? { frame: point.frame, x, y }
    : { frame: point.frame, x, y, status: point.status };
}

export function createPoint(frame: number, x: number, y: number, status?: PointStatus): CurvePoint {
  return status === undefined ? { frame, x, y } : { frame, x, y, status };
}

export function sortByFrame(curve: CurveData): CurvePoint[] {
  return copyCurve(curve).sort((a, b) => a.frame - b.frame);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function centroid(points: readonly Vec2[]): Vec2 {
  let sumX = 0;
  let sumY = 0;
  for (const p of points) {
    sumX += p.x;
    sumY += p.y;
  }
  return { x: sumX / points.length, y: sumY / points.length };
}

/**
 * Unique in-range positions in first-seen order. Out-of-range entries are
 * dropped (and reported at debug level when a collector is given).
 */
export function selectIndices(
  indices: IndexSet,
  length: number,
  operation: string,
  diagnostics?: DiagnosticLog,
): number[] {
  const seen = new Set<number>();
  const valid: number[] = [];
  for (const idx of indices) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= length) {
      diagnostics?.report(
        { code: 'invalid-selection', operation, index: idx, message: `Index ${idx} is outside 0..${length - 1}` },
        'debug',
      );
      continue;
    }
    if (seen.has(idx)) continue;
    seen.add(idx);
    valid.push(idx);
  }
  return valid;
}

/** Inclusive window `[idx-half, idx+half]` clamped to `[0, length-1]`. */
export function windowBounds(idx: number, half: number, length: number): [start: number, end: number] {
  return [Math.max(0, idx - half), Math.min(length - 1, idx + half)];
}

/** Collect x and y of `curve[start..end]` into typed arrays. */
export function extractAxes(curve: CurveData, start: number, end: number): { xs: Float64Array; ys: Float64Array } {
  const n = end - start + 1;
  const xs = new Float64Array(n);
  const ys = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    const p = curve[start + i]!;
    xs[i] = p.x;
    ys[i] = p.y;
  }
  return { xs, ys };
}
