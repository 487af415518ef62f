import { afterEach, describe, it, expect } from 'vitest'
import * as loggerModule from './logger.js'
import { createLogger, resolveLogLevel, setLogLevel } from './logger.js'

describe('resolveLogLevel', () => {
  it('uses LOG_LEVEL when it names a pino level', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug')
  })

  it('ignores an unknown LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info')
  })

  it('is silent under the test runner by default', () => {
    expect(resolveLogLevel({ VITEST: 'true' })).toBe('silent')
  })
})

describe('createLogger', () => {
  it('returns a logger with every level and a child factory', () => {
    const logger = createLogger('Test')

    expect(typeof logger.info).toBe('function')
    expect(typeof logger.child({ request: 'accounts:lookup' }).debug).toBe('function')
  })
})

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent')
  })

  it('applies to context loggers created before the change', () => {
    const logger = createLogger('Transport')
    expect(logger.isLevelEnabled('debug')).toBe(false)

    setLogLevel('debug')

    expect(logger.isLevelEnabled('debug')).toBe(true)
    expect(logger.isLevelEnabled('trace')).toBe(false)
  })
})

describe('module exports', () => {
  it('exposes context loggers only, no shared root instance', () => {
    expect(Object.keys(loggerModule).sort()).toEqual(['createLogger', 'resolveLogLevel', 'setLogLevel'])
  })
})
