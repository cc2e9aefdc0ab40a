import type { FrameRange, Vec2 } from './curve.js'

// ─── Smoothing ───────────────────────────────────────────────────────────────

export interface MovingAverageParams {
  method: 'moving-average'
  windowSize: number
}

export interface GaussianParams {
  method: 'gaussian'
  windowSize: number
  sigma: number
}

export interface SavitzkyGolayParams {
  method: 'savitzky-golay'
  windowSize: number
}

export type SmoothingParams = MovingAverageParams | GaussianParams | SavitzkyGolayParams
export type SmoothingMethod = SmoothingParams['method']

// ─── Filtering ───────────────────────────────────────────────────────────────

export interface MedianFilterParams {
  method: 'median'
  windowSize: number
}

export interface AverageFilterParams {
  method: 'average'
  windowSize: number
}

export interface GaussianFilterParams {
  method: 'gaussian'
  windowSize: number
  sigma: number
}

export interface ButterworthParams {
  method: 'butterworth'
  /** Normalized cutoff; larger passes more of the signal */
  cutoff: number
  order: number
}

export type FilterParams =
  | MedianFilterParams
  | AverageFilterParams
  | GaussianFilterParams
  | ButterworthParams
export type FilterMethod = FilterParams['method']

// ─── Gap filling ─────────────────────────────────────────────────────────────

interface GapFillBase {
  /** Leave frames that already exist in the curve untouched (default true) */
  preserveEndpoints?: boolean
}

export interface LinearFillParams extends GapFillBase {
  method: 'linear'
}

export interface CubicSplineFillParams extends GapFillBase {
  method: 'cubic-spline'
  /** 0..1, higher hugs the chord more tightly */
  tension: number
}

export interface ConstantVelocityFillParams extends GapFillBase {
  method: 'constant-velocity'
  windowSize: number
}

export interface AcceleratedMotionFillParams extends GapFillBase {
  method: 'accelerated-motion'
  windowSize: number
  accelerationWeight: number
}

export interface AverageFillParams extends GapFillBase {
  method: 'average'
  windowSize: number
}

export type GapFillParams =
  | LinearFillParams
  | CubicSplineFillParams
  | ConstantVelocityFillParams
  | AcceleratedMotionFillParams
  | AverageFillParams
export type GapFillMethod = GapFillParams['method']

// ─── Extrapolation ───────────────────────────────────────────────────────────

export type ExtrapolationMethod = 'linear' | 'last-velocity' | 'quadratic'
export type ExtrapolationDirection = 'forward' | 'backward'

export interface ExtrapolationParams {
  method: ExtrapolationMethod
  /** Number of outermost points used to estimate motion */
  fitPoints: number
}

// ─── Problem detection ───────────────────────────────────────────────────────

export type ProblemCategory =
  | 'Sudden Jump'
  | 'Large Movement'
  | 'High Acceleration'
  | 'Medium Acceleration'
  | 'Strong Jitter'
  | 'Moderate Jitter'
  | 'Frame Gap'

export interface DetectedProblem {
  frame: number
  category: ProblemCategory
  /** 0..1 */
  severity: number
  message: string
}

/** Lower (`*Threshold`) and upper (`strong*`/`high*`/`sudden*`) trigger levels. */
export interface DetectionThresholds {
  jump: number
  suddenJump: number
  acceleration: number
  highAcceleration: number
  jitter: number
  strongJitter: number
}

// ─── Requests ────────────────────────────────────────────────────────────────

/** Base shape shared by all dispatchable operations. */
interface OperationBase {
  /** Operation discriminator */
  type: string
}

export interface SmoothOperation extends OperationBase {
  type: 'smooth'
  indices: number[]
  params: SmoothingParams
}

export interface FilterOperation extends OperationBase {
  type: 'filter'
  indices: number[]
  params: FilterParams
}

export interface FillGapOperation extends OperationBase {
  type: 'fill-gap'
  range: FrameRange
  params: GapFillParams
}

export interface ExtrapolateOperation extends OperationBase {
  type: 'extrapolate'
  numFrames: number
  direction: ExtrapolationDirection
  params: ExtrapolationParams
}

export interface ScaleOperation extends OperationBase {
  type: 'scale'
  indices: number[]
  scaleX: number
  scaleY: number
  center?: Vec2
}

export interface RotateOperation extends OperationBase {
  type: 'rotate'
  indices: number[]
  angleDegrees: number
  center?: Vec2
}

export interface OffsetOperation extends OperationBase {
  type: 'offset'
  indices: number[]
  dx: number
  dy: number
}

export interface NormalizeVelocityOperation extends OperationBase {
  type: 'normalize-velocity'
  indices: number[]
  targetVelocity?: number
}

export interface AdjustSmoothnessOperation extends OperationBase {
  type: 'adjust-smoothness'
  indices: number[]
  /** Clamped to 0..1 */
  factor: number
}

export type CurveOperationRequest =
  | SmoothOperation
  | FilterOperation
  | FillGapOperation
  | ExtrapolateOperation
  | ScaleOperation
  | RotateOperation
  | OffsetOperation
  | NormalizeVelocityOperation
  | AdjustSmoothnessOperation

export type CurveOperationType = CurveOperationRequest['type']
