/**
 * Engine configuration read from environment variables.
 *
 * Everything is optional. A value that is present but malformed throws on
 * load with the variable name in the message, so a typo in a deployment
 * shows up immediately instead of silently falling back.
 */

import { z } from 'zod'
import type { DetectionThresholds } from '@curvekit/types'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface EngineConfig {
  logLevel: LogLevel
  logScope: string
  thresholds: DetectionThresholds
}

export type EnvSource = Record<string, string | undefined>

/** Detector trigger levels in pixels (jumps, jitter) and pixels/frame² (acceleration). */
export const DEFAULT_THRESHOLDS: DetectionThresholds = {
  jump: 10.0,
  suddenJump: 30.0,
  acceleration: 0.5,
  highAcceleration: 1.5,
  jitter: 3.0,
  strongJitter: 8.0,
}

const THRESHOLD_ENV_KEYS: Array<[name: keyof DetectionThresholds, key: string]> = [
  ['jump', 'CURVEKIT_JUMP_THRESHOLD'],
  ['suddenJump', 'CURVEKIT_SUDDEN_JUMP_THRESHOLD'],
  ['acceleration', 'CURVEKIT_ACCEL_THRESHOLD'],
  ['highAcceleration', 'CURVEKIT_HIGH_ACCEL_THRESHOLD'],
  ['jitter', 'CURVEKIT_JITTER_THRESHOLD'],
  ['strongJitter', 'CURVEKIT_STRONG_JITTER_THRESHOLD'],
]

const logLevelSchema = z.enum(LOG_LEVELS)
const thresholdSchema = z.coerce.number().finite().positive()

function optional(env: EnvSource, key: string, fallback: string): string {
  const val = env[key]
  return val === undefined || val === '' ? fallback : val
}

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: string, raw: string): T {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'invalid value'
    throw new Error(`Invalid environment variable ${key}="${raw}": ${reason}`)
  }
  return result.data
}

function readThresholds(env: EnvSource): DetectionThresholds {
  const thresholds = { ...DEFAULT_THRESHOLDS }
  for (const [name, key] of THRESHOLD_ENV_KEYS) {
    const raw = env[key]
    if (raw === undefined || raw === '') continue
    thresholds[name] = parseEnv(thresholdSchema, key, raw)
  }
  if (thresholds.suddenJump < thresholds.jump) {
    throw new Error('CURVEKIT_SUDDEN_JUMP_THRESHOLD must not be below CURVEKIT_JUMP_THRESHOLD')
  }
  if (thresholds.highAcceleration < thresholds.acceleration) {
    throw new Error('CURVEKIT_HIGH_ACCEL_THRESHOLD must not be below CURVEKIT_ACCEL_THRESHOLD')
  }
  if (thresholds.strongJitter < thresholds.jitter) {
    throw new Error('CURVEKIT_STRONG_JITTER_THRESHOLD must not be below CURVEKIT_JITTER_THRESHOLD')
  }
  return thresholds
}

/** Resolve engine configuration: environment override > default. */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  const defaultLevel: LogLevel = env['NODE_ENV'] === 'test' ? 'silent' : 'warn'
  const rawLevel = optional(env, 'CURVEKIT_LOG_LEVEL', defaultLevel)

  return {
    logLevel: parseEnv(logLevelSchema, 'CURVEKIT_LOG_LEVEL', rawLevel.toLowerCase()),
    logScope: optional(env, 'CURVEKIT_LOG_SCOPE', 'curve-core'),
    thresholds: readThresholds(env),
  }
}
