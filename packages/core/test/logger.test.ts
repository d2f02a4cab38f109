import { describe, it, expect, vi, afterEach, type Mock } from 'vitest'
import {
  consoleLogger,
  createLevelLogger,
  createPrefixedLogger,
  silentLogger,
  type EnsembleLogger
} from '../src/logger.js'

function createSpyLogger(): Record<keyof EnsembleLogger, Mock> {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  }
}

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should prefix messages with the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    consoleLogger.warn('Sub-model refused to save', { index: 1 })

    expect(warn).toHaveBeenCalledWith('[ensemble:warn] Sub-model refused to save', { index: 1 })
  })

  it('should map trace to console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)

    consoleLogger.trace('select 1')

    expect(debug).toHaveBeenCalledWith('[ensemble:trace] select 1')
  })

  it('should mark fatal messages', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)

    consoleLogger.fatal('gone')

    expect(error).toHaveBeenCalledWith('[ensemble:fatal] FATAL: gone')
  })
})

describe('silentLogger', () => {
  it('should write nothing', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)

    silentLogger.info('hidden')

    expect(info).not.toHaveBeenCalled()
    info.mockRestore()
  })
})

describe('createPrefixedLogger', () => {
  it('should prefix every level', () => {
    const base = createSpyLogger()
    const logger = createPrefixedLogger('conductor', base)

    logger.debug('save skipped', 1)
    logger.error('boom')

    expect(base.debug).toHaveBeenCalledWith('[conductor] save skipped', 1)
    expect(base.error).toHaveBeenCalledWith('[conductor] boom')
  })
})

describe('createLevelLogger', () => {
  it('should drop messages below the threshold', () => {
    const base = createSpyLogger()
    const logger = createLevelLogger('warn', base)

    logger.trace('t')
    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    logger.error('e')
    logger.fatal('f')

    expect(base.trace).not.toHaveBeenCalled()
    expect(base.debug).not.toHaveBeenCalled()
    expect(base.info).not.toHaveBeenCalled()
    expect(base.warn).toHaveBeenCalledWith('w')
    expect(base.error).toHaveBeenCalledWith('e')
    expect(base.fatal).toHaveBeenCalledWith('f')
  })

  it('should drop everything when silent', () => {
    const base = createSpyLogger()
    const logger = createLevelLogger('silent', base)

    logger.fatal('f')

    expect(base.fatal).not.toHaveBeenCalled()
  })

  it('should re-evaluate a threshold function on every call', () => {
    const base = createSpyLogger()
    let threshold: 'debug' | 'error' = 'error'
    const logger = createLevelLogger(() => threshold, base)

    logger.debug('first')
    threshold = 'debug'
    logger.debug('second')

    expect(base.debug).toHaveBeenCalledTimes(1)
    expect(base.debug).toHaveBeenCalledWith('second')
  })
})
