export { filterMedian, upperMedian } from './median.js';
export { filterButterworth, butterworthLowpass, butterworthAlpha } from './butterworth.js';
export { filter, filterAverage, filterGaussian } from './filter.js';
