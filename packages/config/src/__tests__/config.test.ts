import { describe, it, expect, afterEach } from 'vitest'
import {
  DEFAULT_METRICS_SETTINGS,
  DEFAULT_ORDER_LIMITS,
  loadMetricsSettings,
  loadOrderLimits,
  readEnvNumber,
  readEnvNumberList,
  resolveMetricsSettings,
} from '../settings'
import { createLogger, isLogLevel, type LogEntry } from '../logger'

const touched: string[] = []

function setEnv(key: string, value: string) {
  touched.push(key)
  process.env[key] = value
}

afterEach(() => {
  for (const key of touched.splice(0)) delete process.env[key]
})

describe('environment readers', () => {
  it('reads finite numbers', () => {
    setEnv('FIR_TEST_NUMBER', '0.25')
    expect(readEnvNumber('FIR_TEST_NUMBER')).toBe(0.25)
  })

  it('ignores malformed numbers', () => {
    setEnv('FIR_TEST_NUMBER', 'abc')
    expect(readEnvNumber('FIR_TEST_NUMBER')).toBeUndefined()
  })

  it('treats blank values as absent', () => {
    setEnv('FIR_TEST_NUMBER', '  ')
    expect(readEnvNumber('FIR_TEST_NUMBER')).toBeUndefined()
  })

  it('reads number lists', () => {
    setEnv('FIR_TEST_LIST', '-50, -40,-30')
    expect(readEnvNumberList('FIR_TEST_LIST')).toEqual([-50, -40, -30])
  })

  it('rejects a list with any malformed entry', () => {
    setEnv('FIR_TEST_LIST', '-50,x')
    expect(readEnvNumberList('FIR_TEST_LIST')).toBeUndefined()
  })

  it('rejects a list with an empty entry', () => {
    setEnv('FIR_TEST_LIST', '-40,,-30')
    expect(readEnvNumberList('FIR_TEST_LIST')).toBeUndefined()
    setEnv('FIR_TEST_LIST', '-40,-30, ')
    expect(readEnvNumberList('FIR_TEST_LIST')).toBeUndefined()
  })

  it('falls back to the default ladder for a list with an empty entry', () => {
    setEnv('FIR_STOPBAND_LEVELS_DB', '-40,,-30')
    expect(loadMetricsSettings().stopbandLevelsDb).toEqual([-40, -30])
  })
})

describe('metrics settings', () => {
  it('defaults to the -40/-30 dB stopband ladder', () => {
    expect(loadMetricsSettings().stopbandLevelsDb).toEqual([-40, -30])
  })

  it('applies environment overrides', () => {
    setEnv('FIR_STOPBAND_LEVELS_DB', '-60,-50')
    setEnv('FIR_STOPBAND_EDGE_GUARD', '0.02')
    const settings = loadMetricsSettings()
    expect(settings.stopbandLevelsDb).toEqual([-60, -50])
    expect(settings.stopbandEdgeGuard).toBe(0.02)
    expect(settings.attenuationGuard).toBe(DEFAULT_METRICS_SETTINGS.attenuationGuard)
  })

  it('merges partial overrides', () => {
    const settings = resolveMetricsSettings({ passbandLevelDb: -6 })
    expect(settings.passbandLevelDb).toBe(-6)
    expect(settings.magnitudeFloor).toBe(1e-10)
  })
})

describe('settings isolation', () => {
  it('resolved settings own their stopband ladder', () => {
    resolveMetricsSettings().stopbandLevelsDb.push(-10)
    loadMetricsSettings().stopbandLevelsDb.push(-20)
    expect(DEFAULT_METRICS_SETTINGS.stopbandLevelsDb).toEqual([-40, -30])
    expect(resolveMetricsSettings().stopbandLevelsDb).toEqual([-40, -30])
  })

  it('override lists are copied too', () => {
    const levels = [-60, -40]
    const settings = resolveMetricsSettings({ stopbandLevelsDb: levels })
    settings.stopbandLevelsDb.push(-20)
    expect(levels).toEqual([-60, -40])
  })

  it('fallback order limits are a fresh object', () => {
    setEnv('FIR_ORDER_MIN', '12')
    const limits = loadOrderLimits()
    limits.max = 3
    expect(DEFAULT_ORDER_LIMITS).toEqual({ min: 11, max: 201 })
  })
})

describe('order limits', () => {
  it('defaults to 11..201', () => {
    expect(loadOrderLimits()).toEqual({ min: 11, max: 201 })
  })

  it('accepts odd overrides', () => {
    setEnv('FIR_ORDER_MIN', '5')
    setEnv('FIR_ORDER_MAX', '401')
    expect(loadOrderLimits()).toEqual({ min: 5, max: 401 })
  })

  it('falls back when a bound is even or inverted', () => {
    setEnv('FIR_ORDER_MAX', '200')
    expect(loadOrderLimits()).toEqual(DEFAULT_ORDER_LIMITS)
    setEnv('FIR_ORDER_MAX', '7')
    expect(loadOrderLimits()).toEqual(DEFAULT_ORDER_LIMITS)
  })
})

describe('logger', () => {
  it('filters entries below the level', () => {
    const entries: LogEntry[] = []
    const log = createLogger({ level: 'warn', sink: (e) => entries.push(e) })
    log.debug('ignored')
    log.info('ignored')
    log.warn('kept', { order: 23 })
    expect(entries).toHaveLength(1)
    expect(entries[0]?.event).toBe('kept')
    expect(entries[0]?.level).toBe('warn')
    expect(entries[0]?.['order']).toBe(23)
  })

  it('silent drops everything', () => {
    const entries: LogEntry[] = []
    const log = createLogger({ level: 'silent', sink: (e) => entries.push(e) })
    log.error('dropped')
    expect(entries).toHaveLength(0)
  })

  it('child loggers carry bound fields', () => {
    const entries: LogEntry[] = []
    const log = createLogger({ level: 'debug', sink: (e) => entries.push(e) }).child({ component: 'kaiser' })
    log.debug('estimate', { beta: 3.4 })
    expect(entries[0]?.['component']).toBe('kaiser')
    expect(entries[0]?.['beta']).toBe(3.4)
    expect(typeof entries[0]?.ts).toBe('string')
  })

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel('toString')).toBe(false)
  })
})
