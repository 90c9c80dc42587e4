/**
 * Logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createLevelLogger,
  isLogLevel,
  logger,
  noopLogger,
  setLogger,
  type Logger,
} from '../../src/utils/logger'

function createRecordingLogger() {
  const target: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
  return target
}

describe('createLevelLogger', () => {
  it('drops messages below the level', () => {
    const target = createRecordingLogger()
    const log = createLevelLogger('warn', target)

    log.debug('d')
    log.info('i')
    log.warn('w', 1)
    log.error('e', new Error('x'))

    expect(target.debug).not.toHaveBeenCalled()
    expect(target.info).not.toHaveBeenCalled()
    expect(target.warn).toHaveBeenCalledWith('w', 1)
    expect(target.error).toHaveBeenCalledTimes(1)
  })

  it('drops everything when silent', () => {
    const target = createRecordingLogger()
    createLevelLogger('silent', target).error('e')
    expect(target.error).not.toHaveBeenCalled()
  })

  it('passes everything at debug', () => {
    const target = createRecordingLogger()
    createLevelLogger('debug', target).debug('d', { a: 1 })
    expect(target.debug).toHaveBeenCalledWith('d', { a: 1 })
  })
})

describe('setLogger', () => {
  afterEach(() => {
    setLogger(noopLogger)
  })

  it('replaces the global logger', () => {
    const target = createRecordingLogger()
    setLogger(target)
    expect(logger).toBe(target)
  })
})

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('info')).toBe(true)
    expect(isLogLevel('silent')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
