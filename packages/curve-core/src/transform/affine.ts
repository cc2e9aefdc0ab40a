// ---------------------------------------------------------------------------
// Scale, rotate and offset of a point selection
// ---------------------------------------------------------------------------
// The pivot defaults to the centroid of the valid selected points. Frames and
// statuses are kept, unselected points are copied through.

import type { CurveData, CurvePoint, IndexSet, Vec2 } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { centroid, copyCurve, movePoint, selectIndices } from '../curve-utils.js';

type PointMap = (p: CurvePoint) => Vec2;

function mapSelection(
  curve: CurveData,
  valid: readonly number[],
  fn: PointMap,
): CurvePoint[] {
  const out = copyCurve(curve);
  for (const idx of valid) {
    const p = out[idx]!;
    const { x, y } = fn(p);
    out[idx] = movePoint(p, x, y);
  }
  return out;
}

function pivotOf(curve: CurveData, valid: readonly number[], center?: Vec2): Vec2 {
  return center ?? centroid(valid.map((i) => curve[i]!));
}

export function scalePoints(
  curve: CurveData,
  indices: IndexSet,
  scaleX: number,
  scaleY: number,
  center?: Vec2,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const valid = selectIndices(indices, curve.length, 'transform.scale', diagnostics);
  if (valid.length === 0) return copyCurve(curve);
  const c = pivotOf(curve, valid, center);
  return mapSelection(curve, valid, (p) => ({
    x: c.x + (p.x - c.x) * scaleX,
    y: c.y + (p.y - c.y) * scaleY,
  }));
}

/** Counter-clockwise rotation in a y-up frame, angle in degrees. */
export function rotatePoints(
  curve: CurveData,
  indices: IndexSet,
  angleDegrees: number,
  center?: Vec2,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const valid = selectIndices(indices, curve.length, 'transform.rotate', diagnostics);
  if (valid.length === 0) return copyCurve(curve);
  const c = pivotOf(curve, valid, center);
  const rad = (angleDegrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return mapSelection(curve, valid, (p) => {
    const dx = p.x - c.x;
    const dy = p.y - c.y;
    return { x: c.x + dx * cos - dy * sin, y: c.y + dx * sin + dy * cos };
  });
}

export function offsetPoints(
  curve: CurveData,
  indices: IndexSet,
  dx: number,
  dy: number,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const valid = selectIndices(indices, curve.length, 'transform.offset', diagnostics);
  return mapSelection(curve, valid, (p) => ({ x: p.x + dx, y: p.y + dy }));
}
