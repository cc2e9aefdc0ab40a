import type { CurvePoint } from '@curvekit/types';

/** Points at frames 0..n-1 with the given x values and y = 0. */
export function curveFromX(xs: readonly number[]): CurvePoint[] {
  return xs.map((x, frame) => ({ frame, x, y: 0 }));
}

/** Points from [frame, x, y] tuples. */
export function curveFrom(rows: ReadonlyArray<readonly [number, number, number]>): CurvePoint[] {
  return rows.map(([frame, x, y]) => ({ frame, x, y }));
}

export function xs(curve: readonly CurvePoint[]): number[] {
  return curve.map((p) => p.x);
}

export function frames(curve: readonly CurvePoint[]): number[] {
  return curve.map((p) => p.frame);
}
