import { describe, it, expect } from 'vitest'
import { toNotification } from '../../../src/core/notifications'
import {
  InvalidConfigError,
  InvalidParameterError,
  NotFoundError,
  ProviderUnavailableError,
} from '../../../src/utils/errors'
import { ServiceError } from '../../../src/services/service-error'

describe('toNotification', () => {
  it('describes a provider outage without leaking the provider message', () => {
    const cause = new ServiceError(
      "Network error in service 'embeddings': connect ECONNREFUSED 10.0.0.1:443",
      'SERVICE_NETWORK_ERROR',
      'network'
    )
    const error = new ProviderUnavailableError('onRecordChanged', 'TEST_0001', cause)

    expect(toNotification(error, 'onRecordChanged')).toEqual({
      level: 'error',
      code: 'PROVIDER_UNAVAILABLE',
      operation: 'onRecordChanged',
      recordId: 'TEST_0001',
      message:
        "onRecordChanged failed for record 'TEST_0001': the similarity service is unavailable. The previous match result was kept; try again later.",
    })
  })

  it('describes a missing record', () => {
    const error = new NotFoundError('incoming', 'TEST_0404')

    expect(toNotification(error, 'topK', 'TEST_0404')).toEqual({
      level: 'warning',
      code: 'NOT_FOUND',
      operation: 'topK',
      recordId: 'TEST_0404',
      message: "topK failed: incoming record 'TEST_0404' does not exist.",
    })
  })

  it('describes a rejected configuration', () => {
    const error = new InvalidConfigError(
      'exact (0.9) must be greater than or equal to veryClose (0.95)',
      'exact'
    )

    expect(toNotification(error, 'onThresholdsChanged')).toEqual({
      level: 'warning',
      code: 'INVALID_CONFIG',
      operation: 'onThresholdsChanged',
      recordId: undefined,
      message:
        'onThresholdsChanged rejected: exact (0.9) must be greater than or equal to veryClose (0.95).',
    })
  })

  it('describes an invalid parameter', () => {
    const error = new InvalidParameterError('k', 0, 'must be positive (> 0)')

    expect(toNotification(error, 'topK', 'TEST_0001').message).toBe(
      "topK rejected: Invalid parameter 'k': must be positive (> 0)."
    )
  })

  it('hides the message of unexpected errors', () => {
    const error = new Error('password authentication failed for user "engine"')

    expect(toNotification(error, 'backfill')).toEqual({
      level: 'error',
      code: 'UNEXPECTED',
      operation: 'backfill',
      recordId: undefined,
      message: 'backfill failed.',
    })
    expect(toNotification(error, 'onRecordChanged', 'TEST_0001').message).toBe(
      "onRecordChanged failed for record 'TEST_0001'."
    )
  })
})
