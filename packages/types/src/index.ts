// Curve data model, operation parameter shapes and diagnostics shared by every
// curvekit package. Pure types apart from `assertNever`.

export type {
  PointStatus,
  CurvePoint,
  CurveData,
  IndexSet,
  Vec2,
  FrameRange,
} from './curve.js'

export type { DiagnosticCode, Diagnostic } from './diagnostics.js'

export type {
  MovingAverageParams,
  GaussianParams,
  SavitzkyGolayParams,
  SmoothingParams,
  SmoothingMethod,
  MedianFilterParams,
  AverageFilterParams,
  GaussianFilterParams,
  ButterworthParams,
  FilterParams,
  FilterMethod,
  LinearFillParams,
  CubicSplineFillParams,
  ConstantVelocityFillParams,
  AcceleratedMotionFillParams,
  AverageFillParams,
  GapFillParams,
  GapFillMethod,
  ExtrapolationMethod,
  ExtrapolationDirection,
  ExtrapolationParams,
  ProblemCategory,
  DetectedProblem,
  DetectionThresholds,
  SmoothOperation,
  FilterOperation,
  FillGapOperation,
  ExtrapolateOperation,
  ScaleOperation,
  RotateOperation,
  OffsetOperation,
  NormalizeVelocityOperation,
  AdjustSmoothnessOperation,
  CurveOperationRequest,
  CurveOperationType,
} from './operations.js'

/** Exhaustiveness guard for discriminated unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`)
}
