export { smoothMovingAverage, MIN_WINDOW } from './moving-average.js';
export { smoothGaussian, gaussianWeights } from './gaussian.js';
export { smoothSavitzkyGolay, savitzkyGolayFit, SG_MIN_WINDOW, SINGULAR_EPSILON } from './savitzky-golay.js';
export { smooth } from './smooth.js';
