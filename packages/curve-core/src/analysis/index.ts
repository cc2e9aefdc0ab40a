export {
  sortByFrame,
  removeDuplicateFrames,
  calculateCurvature,
  findVelocityOutliers,
} from './curve-analysis.js';
