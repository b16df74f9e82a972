import { describe, it, expect } from 'vitest'
import {
  MatchEngineError,
  NotFoundError,
  InvalidConfigError,
  ProviderUnavailableError,
  InvalidParameterError,
  NotConfiguredError,
  requirePositiveInteger,
  requireInRange,
  requireNonEmptyString,
  isMatchEngineError,
} from '../../../src/utils/errors'

describe('Error classes', () => {
  it('NotFoundError names the entity and id', () => {
    const error = new NotFoundError('reference', 'R9')

    expect(error).toBeInstanceOf(MatchEngineError)
    expect(error.message).toBe("Reference record 'R9' not found")
    expect(error.code).toBe('NOT_FOUND')
    expect(error.context).toEqual({ entity: 'reference', recordId: 'R9' })
  })

  it('InvalidConfigError carries the field', () => {
    const error = new InvalidConfigError('exact must be a number', 'exact')

    expect(error.code).toBe('INVALID_CONFIG')
    expect(error.field).toBe('exact')
    expect(error.name).toBe('InvalidConfigError')
  })

  it('ProviderUnavailableError records the provider message in context', () => {
    const error = new ProviderUnavailableError('topK', 'T1', new Error('socket hang up'))

    expect(error.message).toBe("Similarity provider unavailable during topK for record 'T1'")
    expect(error.context).toEqual({
      operation: 'topK',
      recordId: 'T1',
      providerError: 'socket hang up',
    })
  })

  it('NotConfiguredError includes guidance', () => {
    const error = new NotConfiguredError('recordStore', 'Call .recordStore() before .build().')

    expect(error.message).toBe(
      "Feature 'recordStore' is not configured. Call .recordStore() before .build()."
    )
    expect(error.code).toBe('NOT_CONFIGURED')
  })

  it('isMatchEngineError distinguishes engine errors', () => {
    expect(isMatchEngineError(new InvalidParameterError('k', 0, 'bad'))).toBe(true)
    expect(isMatchEngineError(new Error('plain'))).toBe(false)
  })
})

describe('Validation utilities', () => {
  it('requirePositiveInteger', () => {
    expect(requirePositiveInteger(3, 'k')).toBe(3)
    expect(() => requirePositiveInteger(0, 'k')).toThrow("Invalid parameter 'k': must be positive (> 0)")
    expect(() => requirePositiveInteger(2.5, 'k')).toThrow("Invalid parameter 'k': must be an integer")
  })

  it('requireInRange', () => {
    expect(requireInRange(0, 0, 1, 'score')).toBe(0)
    expect(requireInRange(1, 0, 1, 'score')).toBe(1)
    expect(() => requireInRange(1.5, 0, 1, 'score')).toThrow(
      "Invalid parameter 'score': must be between 0 and 1 (inclusive)"
    )
  })

  it('requireNonEmptyString', () => {
    expect(requireNonEmptyString('crm', 'sourceSystem')).toBe('crm')
    expect(() => requireNonEmptyString(' \t ', 'name')).toThrow(
      "Invalid parameter 'name': must not be empty"
    )
    expect(() => requireNonEmptyString(null, 'name')).toThrow(InvalidParameterError)
    expect(() => requireNonEmptyString(undefined, 'name')).toThrow(InvalidParameterError)
  })
})
