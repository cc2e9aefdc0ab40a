import type { CurveData, CurvePoint, FrameRange, GapFillParams } from '@curvekit/types';
import { assertNever } from '@curvekit/types';
import type { DiagnosticLog } from '../diagnostics.js';
import { fillLinear } from './linear.js';
import { fillCubicSpline } from './cubic-spline.js';
import { fillAcceleratedMotion, fillConstantVelocity } from './velocity.js';
import { fillAverage } from './average.js';

/** Fill the frames of `range` using the given method. Expects a frame-sorted curve. */
export function fillGap(
  curve: CurveData,
  range: FrameRange,
  params: GapFillParams,
  diagnostics?: DiagnosticLog,
): CurvePoint[] {
  const preserve = params.preserveEndpoints ?? true;
  switch (params.method) {
    case 'linear':
      return fillLinear(curve, range, preserve, diagnostics);
    case 'cubic-spline':
      return fillCubicSpline(curve, range, params.tension, preserve, diagnostics);
    case 'constant-velocity':
      return fillConstantVelocity(curve, range, params.windowSize, preserve, diagnostics);
    case 'accelerated-motion':
      return fillAcceleratedMotion(
        curve,
        range,
        params.windowSize,
        params.accelerationWeight,
        preserve,
        diagnostics,
      );
    case 'average':
      return fillAverage(curve, range, params.windowSize, preserve, diagnostics);
    default:
      return assertNever(params);
  }
}
