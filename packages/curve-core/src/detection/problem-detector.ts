// ---------------------------------------------------------------------------
// Tracking problem detector
// ---------------------------------------------------------------------------
// Four independent passes over a frame-ordered curve:
//   jumps         per-frame displacement between neighbours
//   acceleration  |v₁ - v₀| / mean(Δframe) over 3-point windows
//   jitter        mean distance from the centroid of 5-point windows
//   frame gaps    Δframe > 1
// Each pass has a strong and a mild threshold. Mild findings cap their
// severity at 0.7 so a strong finding always sorts first.

import type { CurveData, DetectedProblem, DetectionThresholds, ProblemCategory } from '@curvekit/types';
import { DEFAULT_THRESHOLDS } from '@curvekit/config';
import { centroid, distance } from '../curve-utils.js';

export const MIN_DETECTION_POINTS = 5;
const ACCEL_WINDOW = 3;
const JITTER_WINDOW = 5;
const MILD_SEVERITY_CAP = 0.7;
const GAP_SEVERITY_SCALE = 10;

function grade(
  value: number,
  strong: number,
  mild: number,
  strongCategory: ProblemCategory,
  mildCategory: ProblemCategory,
): { category: ProblemCategory; severity: number } | null {
  if (value > strong) return { category: strongCategory, severity: Math.min(1, value / (2 * strong)) };
  if (value > mild) return { category: mildCategory, severity: Math.min(MILD_SEVERITY_CAP, value / strong) };
  return null;
}

function detectJumps(curve: CurveData, th: DetectionThresholds, out: DetectedProblem[]): void {
  for (let i = 1; i < curve.length; i++) {
    const prev = curve[i - 1]!;
    const cur = curve[i]!;
    const frameDiff = cur.frame - prev.frame;
    if (frameDiff <= 0) continue;
    const dist = distance(prev, cur);
    const perFrame = dist / frameDiff;
    const found = grade(perFrame, th.suddenJump, th.jump, 'Sudden Jump', 'Large Movement');
    if (found) {
      out.push({
        frame: cur.frame,
        ...found,
        message: `Distance of ${dist.toFixed(2)} pixels from previous frame (${perFrame.toFixed(2)}/frame)`,
      });
    }
  }
}

function detectAcceleration(curve: CurveData, th: DetectionThresholds, out: DetectedProblem[]): void {
  for (let i = ACCEL_WINDOW - 1; i < curve.length; i++) {
    const p0 = curve[i - 2]!;
    const p1 = curve[i - 1]!;
    const p2 = curve[i]!;
    const dt0 = p1.frame - p0.frame;
    const dt1 = p2.frame - p1.frame;
    if (dt0 <= 0 || dt1 <= 0) continue;
    const v0 = distance(p0, p1) / dt0;
    const v1 = distance(p1, p2) / dt1;
    const accel = Math.abs(v1 - v0) / ((dt0 + dt1) / 2);
    const found = grade(accel, th.highAcceleration, th.acceleration, 'High Acceleration', 'Medium Acceleration');
    if (found) {
      out.push({
        frame: p2.frame,
        ...found,
        message: `Acceleration of ${accel.toFixed(2)} pixels/frame² (speed ${v0.toFixed(2)} → ${v1.toFixed(2)})`,
      });
    }
  }
}

function detectJitter(curve: CurveData, th: DetectionThresholds, out: DetectedProblem[]): void {
  for (let end = JITTER_WINDOW - 1; end < curve.length; end++) {
    const window = curve.slice(end - JITTER_WINDOW + 1, end + 1);
    const center = centroid(window);
    let sum = 0;
    for (const p of window) sum += distance(p, center);
    const jitter = sum / window.length;
    const found = grade(jitter, th.strongJitter, th.jitter, 'Strong Jitter', 'Moderate Jitter');
    if (found) {
      out.push({
        frame: curve[end]!.frame,
        ...found,
        message: `Mean deviation of ${jitter.toFixed(2)} pixels over ${JITTER_WINDOW} frames`,
      });
    }
  }
}

function detectFrameGaps(curve: CurveData, out: DetectedProblem[]): void {
  for (let i = 1; i < curve.length; i++) {
    const prev = curve[i - 1]!;
    const delta = curve[i]!.frame - prev.frame;
    if (delta > 1) {
      out.push({
        frame: prev.frame,
        category: 'Frame Gap',
        severity: Math.min(1, delta / GAP_SEVERITY_SCALE),
        message: `Gap of ${delta - 1} frames after this point`,
      });
    }
  }
}

/**
 * Scan a frame-ordered curve for tracking problems, most severe first.
 * Ties keep pass order: jumps, acceleration, jitter, gaps.
 */
export function detectProblems(
  curve: CurveData,
  thresholds: DetectionThresholds = DEFAULT_THRESHOLDS,
): DetectedProblem[] {
  if (curve.length < MIN_DETECTION_POINTS) return [];

  const problems: DetectedProblem[] = [];
  detectJumps(curve, thresholds, problems);
  detectAcceleration(curve, thresholds, problems);
  detectJitter(curve, thresholds, problems);
  detectFrameGaps(curve, problems);

  // Array.prototype.sort is stable
  return problems.sort((a, b) => b.severity - a.severity);
}
