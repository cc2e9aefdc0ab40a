export { detectProblems, MIN_DETECTION_POINTS } from './problem-detector.js';
