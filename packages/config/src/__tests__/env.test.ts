import { describe, it, expect } from 'vitest'
import { loadEngineConfig, DEFAULT_THRESHOLDS } from '../index.js'

describe('loadEngineConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadEngineConfig({})
    expect(config.logLevel).toBe('warn')
    expect(config.logScope).toBe('curve-core')
    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS)
  })

  it('silences logging under the test environment', () => {
    expect(loadEngineConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent')
  })

  it('explicit log level wins over NODE_ENV', () => {
    const config = loadEngineConfig({ NODE_ENV: 'test', CURVEKIT_LOG_LEVEL: 'DEBUG' })
    expect(config.logLevel).toBe('debug')
  })

  it('treats empty values as unset', () => {
    const config = loadEngineConfig({ CURVEKIT_LOG_SCOPE: '', CURVEKIT_JUMP_THRESHOLD: '' })
    expect(config.logScope).toBe('curve-core')
    expect(config.thresholds.jump).toBe(10)
  })

  it('reads threshold overrides', () => {
    const config = loadEngineConfig({
      CURVEKIT_JUMP_THRESHOLD: '12.5',
      CURVEKIT_STRONG_JITTER_THRESHOLD: '9',
    })
    expect(config.thresholds.jump).toBe(12.5)
    expect(config.thresholds.strongJitter).toBe(9)
    expect(config.thresholds.suddenJump).toBe(30)
  })

  it('rejects an unknown log level', () => {
    expect(() => loadEngineConfig({ CURVEKIT_LOG_LEVEL: 'verbose' })).toThrow(/CURVEKIT_LOG_LEVEL="verbose"/)
  })

  it('rejects a non-numeric threshold', () => {
    expect(() => loadEngineConfig({ CURVEKIT_ACCEL_THRESHOLD: 'fast' })).toThrow(/CURVEKIT_ACCEL_THRESHOLD="fast"/)
  })

  it('rejects inverted jump thresholds', () => {
    expect(() => loadEngineConfig({ CURVEKIT_SUDDEN_JUMP_THRESHOLD: '5' })).toThrow(
      'CURVEKIT_SUDDEN_JUMP_THRESHOLD must not be below CURVEKIT_JUMP_THRESHOLD',
    )
  })
})
