export { fitQuadratic, PIVOT_EPSILON } from './quadratic-fit.js';
export { extrapolate } from './extrapolate.js';
