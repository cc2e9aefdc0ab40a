import type { CurveData, CurvePoint, FrameRange } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { centroid, copyCurve, createPoint } from '../curve-utils.js';
import { framesToFill, mergePoints } from './merge.js';
import { bracketGap } from './linear.js';

/**
 * Blend between the mean position of up to `windowSize` points on each side,
 * t = (frame - startFrame) / totalFrames.
 */
export function fillAverage(
  curve: CurveData,
  range: FrameRange,
  windowSize: number,
  preserveEndpoints: boolean = true,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const neighbours = bracketGap(curve, range, 'fill.average', diagnostics);
  if (!neighbours) return copyCurve(curve);

  const take = Math.max(1, windowSize);
  const avgBefore = centroid(neighbours.before.slice(0, take));
  const avgAfter = centroid(neighbours.after.slice(0, take));
  const totalFrames = range.endFrame - range.startFrame + 1;

  const generated = framesToFill(range, neighbours.existingFrames, preserveEndpoints).map((frame) => {
    const t = (frame - range.startFrame) / totalFrames;
    return createPoint(
      frame,
      avgBefore.x * (1 - t) + avgAfter.x * t,
      avgBefore.y * (1 - t) + avgAfter.y * t,
      'interpolated',
    );
  });
  return mergePoints(curve, generated);
}
