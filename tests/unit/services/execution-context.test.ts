/**
 * Unit tests for logging and correlation utilities
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  generateCorrelationId,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from '../../../src/services/execution-context'
import type { Logger } from '../../../src/services/types'

describe('generateCorrelationId', () => {
  it('generates unique IDs', () => {
    expect(generateCorrelationId()).not.toBe(generateCorrelationId())
  })

  it('uses the op prefix by default', () => {
    expect(generateCorrelationId().startsWith('op-')).toBe(true)
  })

  it('uses the given prefix', () => {
    expect(generateCorrelationId('backfill')).toMatch(/^backfill-[0-9a-z]+-[0-9a-z]+$/)
  })
})

describe('defaultLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes debug and info lines to console.log', () => {
    defaultLogger.debug('Scoring incoming record', { testId: 'T1' })
    defaultLogger.info('Sweep finished')

    expect(console.log).toHaveBeenCalledWith('[DEBUG] Scoring incoming record', { testId: 'T1' })
    expect(console.log).toHaveBeenCalledWith('[INFO] Sweep finished', '')
  })

  it('writes warnings to console.warn', () => {
    defaultLogger.warn('No reference records to score against')

    expect(console.warn).toHaveBeenCalledWith('[WARN] No reference records to score against', '')
  })

  it('writes errors to console.error', () => {
    defaultLogger.error('Scoring aborted', { testId: 'T1' })

    expect(console.error).toHaveBeenCalledWith('[ERROR] Scoring aborted', { testId: 'T1' })
  })
})

describe('createSilentLogger', () => {
  it('does not throw when called', () => {
    const logger = createSilentLogger()

    expect(() => logger.debug('test')).not.toThrow()
    expect(() => logger.info('test')).not.toThrow()
    expect(() => logger.warn('test')).not.toThrow()
    expect(() => logger.error('test')).not.toThrow()
  })
})

describe('createPrefixedLogger', () => {
  it('prefixes all log levels', () => {
    const baseLogger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }

    const prefixedLogger = createPrefixedLogger('recompute', baseLogger)

    prefixedLogger.debug('debug msg')
    prefixedLogger.info('info msg', { version: 1 })
    prefixedLogger.warn('warn msg')
    prefixedLogger.error('error msg')

    expect(baseLogger.debug).toHaveBeenCalledWith('[recompute] debug msg', undefined)
    expect(baseLogger.info).toHaveBeenCalledWith('[recompute] info msg', { version: 1 })
    expect(baseLogger.warn).toHaveBeenCalledWith('[recompute] warn msg', undefined)
    expect(baseLogger.error).toHaveBeenCalledWith('[recompute] error msg', undefined)
  })
})
