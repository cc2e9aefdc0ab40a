import { describe, it, expect } from 'vitest';
import { filterMedian, upperMedian } from '../filters/median.js';
import { butterworthAlpha, butterworthLowpass, filterButterworth } from '../filters/butterworth.js';
import { filter } from '../filters/filter.js';
import { smoothMovingAverage } from '../smoothing/moving-average.js';
import { DiagnosticLog } from '../diagnostics.js';
import { curveFromX, xs } from './helpers.js';

const spike = curveFromX([0, 0, 10, 0, 0]);

describe('Filtering', () => {
  describe('median', () => {
    it('takes the upper middle value for even lengths', () => {
      expect(upperMedian(Float64Array.from([4, 1, 3, 2]))).toBe(3);
      expect(upperMedian(Float64Array.from([5, -1, 2]))).toBe(2);
    });

    it('removes a single-frame spike', () => {
      const result = filterMedian(spike, [1, 2, 3], 3);
      expect(xs(result)).toEqual([0, 0, 0, 0, 0]);
    });

    it('is idempotent on a monotonic curve', () => {
      const curve = curveFromX([1, 2, 3, 4, 5]);
      const all = [0, 1, 2, 3, 4];
      const once = filterMedian(curve, all, 3);
      expect(once).toEqual(curve);
      expect(filterMedian(once, all, 3)).toEqual(once);
    });

    it('filters x and y independently', () => {
      const curve = [
        { frame: 0, x: 1, y: 9 },
        { frame: 1, x: 5, y: 1 },
        { frame: 2, x: 3, y: 4 },
      ];
      expect(filterMedian(curve, [1], 3)[1]).toEqual({ frame: 1, x: 3, y: 4 });
    });
  });

  describe('butterworth', () => {
    it('derives alpha from cutoff and order', () => {
      expect(butterworthAlpha(1, 2)).toBe(0.5);
      expect(butterworthAlpha(0.5, 1)).toBeCloseTo(0.2, 15);
    });

    it('runs forward then backward', () => {
      const out = butterworthLowpass([0, 0, 10, 0, 0], 1, 1);
      expect(Array.from(out)).toEqual([0.859375, 1.71875, 3.4375, 1.875, 1.25]);
    });

    it('filters the span of the selection but writes only selected points', () => {
      const result = filterButterworth(spike, [0, 2, 4], 1, 1);
      expect(xs(result)).toEqual([0.859375, 0, 3.4375, 0, 1.25]);
    });

    it('handles a selection larger than the argument limit', () => {
      const n = 300_000;
      const curve = Array.from({ length: n }, (_, frame) => ({ frame, x: 5, y: -5 }));
      const all = Array.from({ length: n }, (_, i) => i);
      const result = filterButterworth(curve, all, 0.2, 2);
      expect(result).toHaveLength(n);
      // a constant signal passes through
      expect(result[0]).toEqual({ frame: 0, x: expect.closeTo(5, 9), y: expect.closeTo(-5, 9) });
      expect(result[n - 1]).toEqual({ frame: n - 1, x: expect.closeTo(5, 9), y: expect.closeTo(-5, 9) });
    });

    it('needs at least three selected points', () => {
      const log = new DiagnosticLog();
      expect(filterButterworth(spike, [1, 2], 0.2, 2, log)).toEqual(spike);
      expect(log.byCode('insufficient-data')).toHaveLength(1);
    });
  });

  describe('filter dispatcher', () => {
    it('treats average as a moving average', () => {
      const params = { method: 'average', windowSize: 3 } as const;
      expect(filter(spike, [1, 2, 3], params)).toEqual(smoothMovingAverage(spike, [1, 2, 3], 3));
    });

    it('reports under the filter operation name', () => {
      const log = new DiagnosticLog();
      filter(spike, [2], { method: 'gaussian', windowSize: 1, sigma: 1 }, log);
      expect(log.diagnostics[0]!.operation).toBe('filter.gaussian');
    });

    it('routes median and butterworth', () => {
      expect(xs(filter(spike, [2], { method: 'median', windowSize: 3 }))).toEqual([0, 0, 0, 0, 0]);
      expect(xs(filter(spike, [0, 1, 2, 3, 4], { method: 'butterworth', cutoff: 1, order: 1 }))).toEqual([
        0.859375, 1.71875, 3.4375, 1.875, 1.25,
      ]);
    });
  });
});
