import { describe, it, expect } from 'vitest';
import { offsetPoints, rotatePoints, scalePoints } from '../transform/affine.js';
import { adjustSmoothness, normalizeVelocity } from '../transform/velocity.js';
import { smoothMovingAverage } from '../smoothing/moving-average.js';
import { DiagnosticLog } from '../diagnostics.js';
import { curveFrom, curveFromX, xs } from './helpers.js';

describe('Batch transforms', () => {
  describe('scale', () => {
    it('scales about the centroid of the selection', () => {
      const result = scalePoints(curveFrom([[1, 0, 0], [2, 10, 10]]), [0, 1], 2, 2);
      expect(result).toEqual(curveFrom([[1, -5, -5], [2, 15, 15]]));
    });

    it('uses an explicit center and leaves other points alone', () => {
      const curve = curveFrom([[1, 0, 0], [2, 10, 10]]);
      const result = scalePoints(curve, [1], 2, 3, { x: 0, y: 0 });
      expect(result).toEqual(curveFrom([[1, 0, 0], [2, 20, 30]]));
    });

    it('returns a copy for an empty selection', () => {
      const curve = curveFrom([[1, 0, 0]]);
      const result = scalePoints(curve, [], 2, 2);
      expect(result).toEqual(curve);
      expect(result).not.toBe(curve);
    });
  });

  describe('rotate', () => {
    it('rotates counter-clockwise in degrees', () => {
      const result = rotatePoints(curveFrom([[0, 1, 0]]), [0], 90, { x: 0, y: 0 });
      expect(result[0]!.x).toBeCloseTo(0, 12);
      expect(result[0]!.y).toBeCloseTo(1, 12);
    });

    it('defaults to the selection centroid', () => {
      const result = rotatePoints(curveFrom([[0, 0, 0], [1, 2, 0]]), [0, 1], 180);
      expect(result[0]!.x).toBeCloseTo(2, 12);
      expect(result[1]!.x).toBeCloseTo(0, 12);
      expect(result[1]!.y).toBeCloseTo(0, 12);
    });
  });

  describe('offset', () => {
    it('moves only the selected points', () => {
      const curve = curveFrom([[0, 0, 0], [1, 1, 1]]);
      expect(offsetPoints(curve, [1], 1, 2)).toEqual(curveFrom([[0, 0, 0], [1, 2, 3]]));
    });
  });

  describe('normalizeVelocity', () => {
    const curve = curveFromX([0, 1, 4, 5]);

    it('respaces a run at the mean speed', () => {
      const result = normalizeVelocity(curve, [0, 1, 2, 3]);
      expect(result[0]!.x).toBe(0);
      expect(result[1]!.x).toBeCloseTo(5 / 3, 12);
      expect(result[2]!.x).toBeCloseTo(10 / 3, 12);
      expect(result[3]!.x).toBeCloseTo(5, 12);
    });

    it('uses an explicit target', () => {
      expect(xs(normalizeVelocity(curve, [3, 2, 1, 0], 2))).toEqual([0, 2, 4, 6]);
    });

    it('keeps a zero-length segment on its predecessor', () => {
      expect(xs(normalizeVelocity(curveFromX([0, 0, 3]), [0, 1, 2]))).toEqual([0, 0, 1.5]);
    });

    it('ignores a non-contiguous selection', () => {
      const log = new DiagnosticLog();
      expect(normalizeVelocity(curve, [0, 2], undefined, log)).toEqual(curve);
      expect(log.byCode('invalid-selection')).toHaveLength(1);
    });

    it('ignores single points and out-of-range selections', () => {
      expect(normalizeVelocity(curve, [1])).toEqual(curve);
      expect(normalizeVelocity(curve, [3, 4])).toEqual(curve);
    });

    it('ignores a non-positive target', () => {
      const log = new DiagnosticLog();
      expect(normalizeVelocity(curve, [0, 1], 0, log)).toEqual(curve);
      expect(log.has('parameter-out-of-range')).toBe(true);
    });
  });

  describe('adjustSmoothness', () => {
    const curve = curveFromX([0, 5, 1, 7, 2, 9, 3, 8, 4, 6]);
    const all = curve.map((_, i) => i);

    it('is a copy at factor 0', () => {
      expect(adjustSmoothness(curve, all, 0)).toEqual(curve);
    });

    it('grows an odd window with the factor', () => {
      expect(adjustSmoothness(curve, all, 0.05)).toEqual(smoothMovingAverage(curve, all, 3));
      expect(adjustSmoothness(curve, all, 0.1)).toEqual(smoothMovingAverage(curve, all, 5));
    });

    it('clamps the factor to 1', () => {
      const log = new DiagnosticLog();
      expect(adjustSmoothness(curve, all, 2, log)).toEqual(smoothMovingAverage(curve, all, 15));
      expect(log.byCode('parameter-out-of-range')).toHaveLength(1);
    });
  });
});
