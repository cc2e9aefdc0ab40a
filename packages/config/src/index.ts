// Shared configuration: log settings and problem-detector thresholds.

export {
  loadEngineConfig,
  DEFAULT_THRESHOLDS,
  LOG_LEVELS,
  type EngineConfig,
  type EnvSource,
  type LogLevel,
} from './env.js'
