// ---------------------------------------------------------------------------
// Operation dispatcher
// ---------------------------------------------------------------------------
// One entry point for hosts that describe work as data (undo stacks, scripted
// batches, IPC). `parseCurveOperation` is the only place that throws: it turns
// an untyped request into a CurveOperationRequest or a CurveParameterError.

import type { CurveData, CurveOperationRequest, CurvePoint } from '@curvekit/types';
import { assertNever } from '@curvekit/types';
import { curveOperationSchema } from '@curvekit/shared';
import type { DiagnosticLog } from './diagnostics.js';
import { CurveParameterError } from './errors.js';
import { sortByFrame } from './curve-utils.js';
import { smooth } from './smoothing/smooth.js';
import { filter } from './filters/filter.js';
import { fillGap } from './gap-filling/fill-gap.js';
import { extrapolate } from './extrapolation/extrapolate.js';
import {
  adjustSmoothness,
  normalizeVelocity,
  offsetPoints,
  rotatePoints,
  scalePoints,
} from './transform/index.js';

export function parseCurveOperation(input: unknown): CurveOperationRequest {
  const result = curveOperationSchema.safeParse(input);
  if (result.success) return result.data;

  const fields: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_root';
    (fields[key] ??= []).push(issue.message);
  }
  throw new CurveParameterError(`Invalid curve operation: ${Object.keys(fields).join(', ')}`, fields);
}

function dispatch(curve: CurveData, request: CurveOperationRequest, diagnostics?: DiagnosticLog): CurvePoint[] {
  switch (request.type) {
    case 'smooth':
      return smooth(curve, request.indices, request.params, diagnostics);
    case 'filter':
      return filter(curve, request.indices, request.params, diagnostics);
    case 'fill-gap':
      return fillGap(sortByFrame(curve), request.range, request.params, diagnostics);
    case 'extrapolate':
      return extrapolate(curve, request.numFrames, request.params, request.direction, diagnostics);
    case 'scale':
      return scalePoints(curve, request.indices, request.scaleX, request.scaleY, request.center, diagnostics);
    case 'rotate':
      return rotatePoints(curve, request.indices, request.angleDegrees, request.center, diagnostics);
    case 'offset':
      return offsetPoints(curve, request.indices, request.dx, request.dy, diagnostics);
    case 'normalize-velocity':
      return normalizeVelocity(curve, request.indices, request.targetVelocity, diagnostics);
    case 'adjust-smoothness':
      return adjustSmoothness(curve, request.indices, request.factor, diagnostics);
    default:
      return assertNever(request);
  }
}

/** Run one operation. Never throws; see `DiagnosticLog` for what was absorbed. */
export function runCurveOperation(
  curve: CurveData,
  request: CurveOperationRequest,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  if (!diagnostics) return dispatch(curve, request);

  const start = performance.now();
  const before = diagnostics.diagnostics.length;
  const result = dispatch(curve, request, diagnostics);
  diagnostics.trace('curve operation', {
    type: request.type,
    points: curve.length,
    resultPoints: result.length,
    diagnostics: diagnostics.diagnostics.length - before,
    durationMs: Math.round((performance.now() - start) * 1000) / 1000,
  });
  return result;
}
