import { afterEach, describe, expect, it } from 'vitest'
import { createLogger, getLogLevel, log, setLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent')
  })

  it('starts at the level from LOG_LEVEL', () => {
    expect(getLogLevel()).toBe('silent')
  })

  it('changes the level at runtime', () => {
    setLogLevel('debug')

    expect(getLogLevel()).toBe('debug')
  })

  it('accepts a message with structured fields or an error', () => {
    const logger = createLogger('PacingEngine')

    expect(() => logger.info('Paced kenney.nl', { waitMs: 2400 })).not.toThrow()
    expect(() => logger.warn('Config rejected:', new Error('bad value'))).not.toThrow()
    expect(() => log.debug('a', 1, true)).not.toThrow()
  })
})
