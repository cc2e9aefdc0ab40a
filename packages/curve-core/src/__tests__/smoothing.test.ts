import { describe, it, expect } from 'vitest';
import { smoothMovingAverage } from '../smoothing/moving-average.js';
import { gaussianWeights, smoothGaussian } from '../smoothing/gaussian.js';
import { savitzkyGolayFit, smoothSavitzkyGolay } from '../smoothing/savitzky-golay.js';
import { smooth } from '../smoothing/smooth.js';
import { DiagnosticLog } from '../diagnostics.js';
import { curveFromX, xs } from './helpers.js';

const spike = curveFromX([0, 0, 10, 0, 0]);

describe('Smoothing', () => {
  describe('moving average', () => {
    it('averages the clamped window around each selected point', () => {
      const result = smoothMovingAverage(curveFromX([0, 3, 6, 0, 0]), [1, 2], 3);
      expect(xs(result)).toEqual([0, 3, 3, 0, 0]);
    });

    it('reads neighbours from the input, not from already smoothed points', () => {
      const result = smoothMovingAverage(spike, [1, 2, 3], 3);
      expect(result[1]!.x).toBeCloseTo(10 / 3, 12);
      expect(result[2]!.x).toBeCloseTo(10 / 3, 12);
      expect(result[3]!.x).toBeCloseTo(10 / 3, 12);
    });

    it('leaves an endpoint alone when its clamped window has two points', () => {
      const log = new DiagnosticLog();
      const result = smoothMovingAverage(spike, [0], 3, log);
      expect(result[0]).toEqual({ frame: 0, x: 0, y: 0 });
      expect(log.byCode('insufficient-data')).toHaveLength(1);
      expect(log.diagnostics[0]!.index).toBe(0);
    });

    it('is a no-op below the minimum window size', () => {
      const log = new DiagnosticLog();
      const result = smoothMovingAverage(spike, [1, 2, 3], 2, log);
      expect(result).toEqual(spike);
      expect(log.has('insufficient-data')).toBe(true);
    });

    it('skips out-of-range indices', () => {
      const log = new DiagnosticLog();
      const result = smoothMovingAverage(spike, [-1, 9, 2], 3, log);
      expect(result[2]!.x).toBeCloseTo(10 / 3, 12);
      expect(log.byCode('invalid-selection').map((d) => d.index)).toEqual([-1, 9]);
    });

    it('keeps frame and status of moved points', () => {
      const curve = [
        { frame: 10, x: 0, y: 0 },
        { frame: 11, x: 3, y: 3, status: 'keyframe' as const },
        { frame: 12, x: 6, y: 6 },
      ];
      const result = smoothMovingAverage(curve, [1], 3);
      expect(result[1]).toEqual({ frame: 11, x: 3, y: 3, status: 'keyframe' });
    });
  });

  describe('gaussian', () => {
    it('builds a symmetric normalized kernel', () => {
      const w = gaussianWeights(5, 1);
      expect(w.length).toBe(5);
      expect(w[0]).toBeCloseTo(w[4]!, 15);
      expect(w[1]).toBeCloseTo(w[3]!, 15);
      expect(w.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 9);
    });

    it('weights the center more than a moving average', () => {
      const result = smoothGaussian(spike, [2], 3, 1);
      expect(result[2]!.x).toBeCloseTo(10 / (1 + 2 * Math.exp(-0.5)), 10);
    });

    it('renormalizes the kernel over a clamped window', () => {
      // window 5 at index 0 covers 0..2 with kernel taps 2..4
      const result = smoothGaussian(curveFromX([0, 10, 0, 0, 0]), [0], 5, 1);
      const e = Math.exp(-0.5);
      expect(result[0]!.x).toBeCloseTo((10 * e) / (1 + e + Math.exp(-2)), 10);
    });

    it('rejects a non-positive sigma', () => {
      const log = new DiagnosticLog();
      expect(smoothGaussian(spike, [2], 3, 0, log)).toEqual(spike);
      expect(log.byCode('parameter-out-of-range')).toHaveLength(1);
    });
  });

  describe('savitzky-golay', () => {
    it('reproduces a quadratic exactly', () => {
      const values = [0, 1, 4, 9, 16];
      for (let t = 0; t < values.length; t++) {
        expect(savitzkyGolayFit(values, t)).toBeCloseTo(values[t]!, 9);
      }
    });

    it('matches the classic 5-point center coefficients', () => {
      // (-3, 12, 17, 12, -3) / 35
      const result = smoothSavitzkyGolay(spike, [2], 5);
      expect(result[2]!.x).toBeCloseTo(170 / 35, 9);
      expect(result[2]!.y).toBeCloseTo(0, 9);
    });

    it('skips points whose clamped window is shorter than five', () => {
      const log = new DiagnosticLog();
      const result = smoothSavitzkyGolay(spike, [0, 1], 5, log);
      expect(result).toEqual(spike);
      expect(log.byCode('insufficient-data').map((d) => d.index)).toEqual([0, 1]);
    });

    it('is a no-op with a window below five', () => {
      const log = new DiagnosticLog();
      expect(smoothSavitzkyGolay(spike, [2], 3, log)).toEqual(spike);
      expect(log.diagnostics).toHaveLength(1);
    });
  });

  describe('smooth dispatcher', () => {
    it('routes each method', () => {
      expect(smooth(spike, [2], { method: 'moving-average', windowSize: 3 })[2]!.x).toBeCloseTo(10 / 3, 12);
      expect(smooth(spike, [2], { method: 'gaussian', windowSize: 3, sigma: 1 })[2]!.x).toBeCloseTo(
        10 / (1 + 2 * Math.exp(-0.5)),
        10,
      );
      expect(smooth(spike, [2], { method: 'savitzky-golay', windowSize: 5 })[2]!.x).toBeCloseTo(170 / 35, 9);
    });
  });
});
