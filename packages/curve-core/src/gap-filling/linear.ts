import type { CurveData, CurvePoint, FrameRange } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { copyCurve, createPoint } from '../curve-utils.js';
import { framesToFill, gapNeighbours, mergePoints, type GapNeighbours } from './merge.js';

/**
 * Returns the neighbours when both sides of the gap have at least one point,
 * otherwise reports and returns null.
 */
export function bracketGap(
  curve: CurveData,
  range: FrameRange,
  operation: string,
  diagnostics?: DiagnosticLog,
): GapNeighbours | null {
  const neighbours = gapNeighbours(curve, range);
  if (neighbours.before.length === 0 || neighbours.after.length === 0) {
    diagnostics?.report({
      code: 'insufficient-data',
      operation,
      message: `No tracked point on ${neighbours.before.length === 0 ? 'the start' : 'the end'} side of frames ${range.startFrame}..${range.endFrame}`,
    });
    return null;
  }
  return neighbours;
}

/** Straight line between the nearest point before and after the gap. */
export function fillLinear(
  curve: CurveData,
  range: FrameRange,
  preserveEndpoints: boolean = true,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const neighbours = bracketGap(curve, range, 'fill.linear', diagnostics);
  if (!neighbours) return copyCurve(curve);

  const b = neighbours.before[0]!;
  const a = neighbours.after[0]!;
  const frameDiff = a.frame - b.frame;

  const generated = framesToFill(range, neighbours.existingFrames, preserveEndpoints).map((frame) => {
    const t = (frame - b.frame) / frameDiff;
    return createPoint(frame, b.x + (a.x - b.x) * t, b.y + (a.y - b.y) * t, 'interpolated');
  });
  return mergePoints(curve, generated);
}
