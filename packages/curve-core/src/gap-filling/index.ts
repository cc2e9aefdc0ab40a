export { mergePoints, gapNeighbours, framesToFill, type GapNeighbours } from './merge.js';
export { fillLinear, bracketGap } from './linear.js';
export { fillCubicSpline, hermiteBasis } from './cubic-spline.js';
export { fillConstantVelocity, fillAcceleratedMotion, sideVelocity } from './velocity.js';
export { fillAverage } from './average.js';
export { fillGap } from './fill-gap.js';
