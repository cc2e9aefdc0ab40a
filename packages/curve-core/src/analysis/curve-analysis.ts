// ---------------------------------------------------------------------------
// Read-only curve measurements
// ---------------------------------------------------------------------------

import type { CurveData, CurvePoint } from '@curvekit/types';
import { clonePoint, distance } from '../curve-utils.js';

export { sortByFrame } from '../curve-utils.js';

/** Drop later points whose frame was already seen. Order is kept. */
export function removeDuplicateFrames(curve: CurveData): CurvePoint[] {
  const seen = new Set<number>();
  const out: CurvePoint[] = [];
  for (const p of curve) {
    if (seen.has(p.frame)) continue;
    seen.add(p.frame);
    out.push(clonePoint(p));
  }
  return out;
}

/**
 * Turning angle per unit length at each interior point,
 * |atan2(cross, dot)| / mean(adjacent segment lengths). Endpoints and
 * points with a zero-length neighbour segment get 0.
 */
export function calculateCurvature(curve: CurveData): Float64Array {
  const n = curve.length;
  const out = new Float64Array(n);
  for (let i = 1; i < n - 1; i++) {
    const prev = curve[i - 1]!;
    const cur = curve[i]!;
    const next = curve[i + 1]!;
    const ax = cur.x - prev.x;
    const ay = cur.y - prev.y;
    const bx = next.x - cur.x;
    const by = next.y - cur.y;
    const lenA = Math.hypot(ax, ay);
    const lenB = Math.hypot(bx, by);
    if (lenA === 0 || lenB === 0) continue;
    const angle = Math.atan2(ax * by - ay * bx, ax * bx + ay * by);
    out[i] = Math.abs(angle) / ((lenA + lenB) / 2);
  }
  return out;
}

/**
 * Indices of points reached at a per-frame speed of at least
 * `mean · thresholdFactor`. Segments without frame progress are ignored.
 */
export function findVelocityOutliers(curve: CurveData, thresholdFactor: number = 2): number[] {
  const speeds: Array<{ index: number; speed: number }> = [];
  for (let i = 1; i < curve.length; i++) {
    const dt = curve[i]!.frame - curve[i - 1]!.frame;
    if (dt <= 0) continue;
    speeds.push({ index: i, speed: distance(curve[i - 1]!, curve[i]!) / dt });
  }
  if (speeds.length === 0) return [];

  let mean = 0;
  for (const s of speeds) mean += s.speed;
  mean /= speeds.length;
  if (mean === 0) return [];

  const limit = mean * thresholdFactor;
  return speeds.filter((s) => s.speed >= limit).map((s) => s.index);
}
