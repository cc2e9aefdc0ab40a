// ---------------------------------------------------------------------------
// Velocity-based fills
// ---------------------------------------------------------------------------
// Per-frame velocity is estimated from `windowSize` points on each side of the
// gap, Σ Δpos/Δframe / (windowSize-1), pairs with no frame gap skipped.
// Constant velocity averages both estimates; accelerated motion starts at the
// before-velocity and ramps towards the after-velocity.

import type { CurveData, CurvePoint, FrameRange, Vec2 } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, createPoint } from '../curve-utils.js';
import { framesToFill, mergePoints } from './merge.js';
import { bracketGap, fillLinear } from './linear.js';

/**
 * Mean per-frame velocity over the first `windowSize` points of `side`
 * (ordered nearest-first). The sign is normalized to increasing frames.
 */
export function sideVelocity(side: readonly CurvePoint[], windowSize: number): Vec2 {
  let vx = 0;
  let vy = 0;
  for (let i = 1; i < windowSize; i++) {
    const near = side[i - 1]!;
    const far = side[i]!;
    const frameDiff = near.frame - far.frame;
    if (frameDiff === 0) continue;
    vx += (near.x - far.x) / frameDiff;
    vy += (near.y - far.y) / frameDiff;
  }
  return { x: vx / (windowSize - 1), y: vy / (windowSize - 1) };
}

export function fillConstantVelocity(
  curve: CurveData,
  range: FrameRange,
  windowSize: number,
  preserveEndpoints: boolean = true,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'fill.constant-velocity';
  const neighbours = bracketGap(curve, range, operation, diagnostics);
  if (!neighbours) return copyCurve(curve);

  const { before, after } = neighbours;
  if (windowSize < 2 || before.length < windowSize || after.length < windowSize) {
    diagnostics?.report({
      code: 'method-fallback',
      operation,
      message: `Constant velocity needs ${windowSize} points (at least 2) on each side, using linear fill`,
    });
    return fillLinear(curve, range, preserveEndpoints, diagnostics);
  }

  const vb = sideVelocity(before, windowSize);
  const va = sideVelocity(after, windowSize);
  const vx = (vb.x + va.x) / 2;
  const vy = (vb.y + va.y) / 2;
  const b = before[0]!;

  const generated = framesToFill(range, neighbours.existingFrames, preserveEndpoints).map((frame) => {
    const steps = frame - b.frame;
    return createPoint(frame, b.x + vx * steps, b.y + vy * steps, 'interpolated');
  });
  return mergePoints(curve, generated);
}

/**
 * pos = b + v_before·s + ½·a·s², a = (v_after - v_before) / totalFrames · weight.
 * Falls back to constant velocity when a side is short.
 */
export function fillAcceleratedMotion(
  curve: CurveData,
  range: FrameRange,
  windowSize: number,
  accelerationWeight: number,
  preserveEndpoints: boolean = true,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const operation = 'fill.accelerated-motion';
  const neighbours = bracketGap(curve, range, operation, diagnostics);
  if (!neighbours) return copyCurve(curve);

  const { before, after } = neighbours;
  if (windowSize < 2 || before.length < windowSize || after.length < windowSize) {
    diagnostics?.report({
      code: 'method-fallback',
      operation,
      message: `Accelerated motion needs ${windowSize} points (at least 2) on each side, using constant velocity`,
    });
    return fillConstantVelocity(curve, range, windowSize, preserveEndpoints, diagnostics);
  }

  const vb = sideVelocity(before, windowSize);
  const va = sideVelocity(after, windowSize);
  const totalFrames = range.endFrame - range.startFrame + 1;
  const ax = ((va.x - vb.x) / totalFrames) * accelerationWeight;
  const ay = ((va.y - vb.y) / totalFrames) * accelerationWeight;
  const b = before[0]!;

  const generated = framesToFill(range, neighbours.existingFrames, preserveEndpoints).map((frame) => {
    const s = frame - b.frame;
    return createPoint(
      frame,
      b.x + vb.x * s + 0.5 * ax * s * s,
      b.y + vb.y * s + 0.5 * ay * s * s,
      'interpolated',
    );
  });
  return mergePoints(curve, generated);
}
