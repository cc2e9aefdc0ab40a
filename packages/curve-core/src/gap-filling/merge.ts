// ---------------------------------------------------------------------------
// Frame-map merge shared by gap filling and extrapolation
// ---------------------------------------------------------------------------

import type { CurveData, CurvePoint, FrameRange } from '@curvekit/types';
import { clonePoint } from '../curve-utils.js';

/**
 * Overlay `additions` on `curve` keyed by frame (additions win on collision)
 * and return the union sorted by frame.
 */
export function mergePoints(curve: CurveData, additions: readonly CurvePoint[]): CurvePoint[] {
  const byFrame = new Map<number, CurvePoint>();
  for (const p of curve) byFrame.set(p.frame, clonePoint(p));
  for (const p of additions) byFrame.set(p.frame, clonePoint(p));
  return [...byFrame.values()].sort((a, b) => a.frame - b.frame);
}

/** Points bracketing a gap, nearest first on each side. */
export interface GapNeighbours {
  before: CurvePoint[];
  after: CurvePoint[];
  existingFrames: ReadonlySet<number>;
}

export function gapNeighbours(curve: CurveData, range: FrameRange): GapNeighbours {
  const before = curve.filter((p) => p.frame < range.startFrame).sort((a, b) => b.frame - a.frame);
  const after = curve.filter((p) => p.frame > range.endFrame).sort((a, b) => a.frame - b.frame);
  return { before, after, existingFrames: new Set(curve.map((p) => p.frame)) };
}

/** Frames of the range to generate, skipping existing ones when preserving. */
export function framesToFill(
  range: FrameRange,
  existingFrames: ReadonlySet<number>,
  preserveEndpoints: boolean,
): number[] {
  const frames: number[] = [];
  for (let f = range.startFrame; f <= range.endFrame; f++) {
    if (preserveEndpoints && existingFrames.has(f)) continue;
    frames.push(f);
  }
  return frames;
}
