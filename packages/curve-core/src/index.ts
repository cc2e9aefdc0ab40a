// ---------------------------------------------------------------------------
// @curvekit/curve-core — Barrel Export
// ---------------------------------------------------------------------------
// Pure, synchronous editing operations on 2D tracking curves. Every operation
// returns a new array and never mutates its input.

// Shared types re-exported for convenience
export type {
  CurvePoint,
  CurveData,
  PointStatus,
  IndexSet,
  Vec2,
  FrameRange,
  Diagnostic,
  DiagnosticCode,
  SmoothingParams,
  FilterParams,
  GapFillParams,
  ExtrapolationParams,
  ExtrapolationMethod,
  ExtrapolationDirection,
  DetectedProblem,
  DetectionThresholds,
  ProblemCategory,
  CurveOperationRequest,
  CurveOperationType,
} from '@curvekit/types';

// Infrastructure
export {
  createLogger,
  createLoggerFromConfig,
  type Logger,
  type LoggerOptions,
  type LogFields,
  type EntryLevel,
} from './logging/index.js';
export { DiagnosticLog, type DiagnosticSeverity } from './diagnostics.js';
export { CurveParameterError } from './errors.js';
export {
  clonePoint,
  copyCurve,
  createPoint,
  distance,
  centroid,
  selectIndices,
} from './curve-utils.js';

// Smoothing
export {
  smooth,
  smoothMovingAverage,
  smoothGaussian,
  smoothSavitzkyGolay,
  gaussianWeights,
  savitzkyGolayFit,
} from './smoothing/index.js';

// Filtering
export {
  filter,
  filterMedian,
  filterAverage,
  filterGaussian,
  filterButterworth,
  butterworthLowpass,
  upperMedian,
} from './filters/index.js';

// Gap filling
export {
  fillGap,
  fillLinear,
  fillCubicSpline,
  fillConstantVelocity,
  fillAcceleratedMotion,
  fillAverage,
  mergePoints,
} from './gap-filling/index.js';

// Extrapolation
export { extrapolate, fitQuadratic } from './extrapolation/index.js';

// Problem detection
export { detectProblems, MIN_DETECTION_POINTS } from './detection/index.js';

// Batch transforms
export {
  scalePoints,
  rotatePoints,
  offsetPoints,
  normalizeVelocity,
  adjustSmoothness,
} from './transform/index.js';

// Analysis
export {
  sortByFrame,
  removeDuplicateFrames,
  calculateCurvature,
  findVelocityOutliers,
} from './analysis/index.js';

// Dispatcher
export { runCurveOperation, parseCurveOperation } from './operations.js';
