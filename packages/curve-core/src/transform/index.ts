export { scalePoints, rotatePoints, offsetPoints } from './affine.js';
export { normalizeVelocity, adjustSmoothness } from './velocity.js';
