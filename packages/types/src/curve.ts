// ─── Points ──────────────────────────────────────────────────────────────────

/** Informational tag carried by a tracked point. Never used in the math. */
export type PointStatus = 'normal' | 'interpolated' | 'keyframe' | 'tracked' | 'endframe'

/** One tracked sample: an integer frame and a 2D position. */
export interface CurvePoint {
  readonly frame: number
  readonly x: number
  readonly y: number
  readonly status?: PointStatus
}

/**
 * Ordered point sequence. Frames are unique; frame-range operations expect
 * ascending frame order, index-based operations work on positions.
 */
export type CurveData = readonly CurvePoint[]

/** 0-based positions into a curve. Distinct from frame numbers. */
export type IndexSet = Iterable<number>

/** 2D vector / pivot */
export interface Vec2 {
  x: number
  y: number
}

/** Inclusive frame range. */
export interface FrameRange {
  startFrame: number
  endFrame: number
}
