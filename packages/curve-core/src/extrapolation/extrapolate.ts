// ---------------------------------------------------------------------------
// Extrapolation past either end of a curve
// ---------------------------------------------------------------------------
// Forward appends frames last+1..last+n, backward prepends first-1..first-n.
// The fit window is the outermost `fitPoints` points on that side, kept in
// ascending frame order so every method reads the same way in both directions.
// Linear ignores the window and always uses the two outermost points.

import type {
  CurveData,
  CurvePoint,
  ExtrapolationDirection,
  ExtrapolationParams,
  Vec2,
} from '@curvekit/types';
import { assertNever } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { createPoint, sortByFrame } from '../curve-utils.js';
import { mergePoints } from '../gap-filling/merge.js';
import { fitQuadratic } from './quadratic-fit.js';

type Predictor = (frame: number) => Vec2;

function fitWindow(sorted: readonly CurvePoint[], fitPoints: number, direction: ExtrapolationDirection): CurvePoint[] {
  const count = Math.max(0, Math.min(fitPoints, sorted.length));
  return direction === 'forward' ? sorted.slice(sorted.length - count) : sorted.slice(0, count);
}

function linearPredictor(points: readonly CurvePoint[], direction: ExtrapolationDirection): Predictor | null {
  if (points.length < 2) return null;
  const edge = direction === 'forward' ? points[points.length - 1]! : points[0]!;
  const inner = direction === 'forward' ? points[points.length - 2]! : points[1]!;
  const frameDiff = edge.frame - inner.frame;
  if (frameDiff === 0) return null;
  const vx = (edge.x - inner.x) / frameDiff;
  const vy = (edge.y - inner.y) / frameDiff;
  return (frame) => ({ x: edge.x + vx * (frame - edge.frame), y: edge.y + vy * (frame - edge.frame) });
}

function lastVelocityPredictor(window: readonly CurvePoint[], direction: ExtrapolationDirection): Predictor | null {
  let vx = 0;
  let vy = 0;
  let count = 0;
  for (let i = 1; i < window.length; i++) {
    const prev = window[i - 1]!;
    const cur = window[i]!;
    const frameDiff = cur.frame - prev.frame;
    if (frameDiff <= 0) continue;
    vx += (cur.x - prev.x) / frameDiff;
    vy += (cur.y - prev.y) / frameDiff;
    count++;
  }
  if (count === 0) return null;
  vx /= count;
  vy /= count;
  const edge = direction === 'forward' ? window[window.length - 1]! : window[0]!;
  return (frame) => ({ x: edge.x + vx * (frame - edge.frame), y: edge.y + vy * (frame - edge.frame) });
}

function quadraticPredictor(window: readonly CurvePoint[]): Predictor | null {
  if (window.length < 3) return null;
  const base = window[0]!.frame;
  const ts = window.map((p) => p.frame - base);
  const cx = fitQuadratic(ts, window.map((p) => p.x));
  const cy = fitQuadratic(ts, window.map((p) => p.y));
  if (!cx || !cy) return null;
  const [x0, x1, x2] = cx;
  const [y0, y1, y2] = cy;
  return (frame) => {
    const t = frame - base;
    return { x: x0 + x1 * t + x2 * t * t, y: y0 + y1 * t + y2 * t * t };
  };
}

/**
 * Generate `numFrames` points beyond the chosen end of the curve. Returns a
 * sorted copy unchanged when there is nothing to extrapolate from.
 */
export function extrapolate(
  curve: CurveData,
  numFrames: number,
  params: ExtrapolationParams,
  direction: ExtrapolationDirection = 'forward',
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = `extrapolate.${params.method}`;
  const sorted = sortByFrame(curve);
  if (sorted.length === 0 || numFrames <= 0) return sorted;

  const window = fitWindow(sorted, params.fitPoints, direction);
  let predictor: Predictor | null;
  switch (params.method) {
    case 'linear':
      predictor = linearPredictor(sorted, direction);
      break;
    case 'last-velocity':
      predictor = lastVelocityPredictor(window, direction);
      break;
    case 'quadratic':
      predictor = quadraticPredictor(window);
      break;
    default:
      return assertNever(params.method);
  }

  if (!predictor) {
    const degenerate = params.method === 'quadratic' && window.length >= 3;
    diagnostics?.report({
      code: degenerate ? 'degenerate-fit' : 'insufficient-data',
      operation,
      message: degenerate
        ? `Quadratic fit over ${window.length} points is singular`
        : `Cannot estimate motion from ${window.length} fit point(s)`,
    });
    return sorted;
  }

  const edgeFrame = direction === 'forward' ? sorted[sorted.length - 1]!.frame : sorted[0]!.frame;
  const step = direction === 'forward' ? 1 : -1;
  const generated: CurvePoint[] = [];
  for (let i = 1; i <= numFrames; i++) {
    const frame = edgeFrame + step * i;
    const { x, y } = predictor(frame);
    generated.push(createPoint(frame, x, y, 'interpolated'));
  }
  return mergePoints(sorted, generated);
}
