import { isServiceError } from '../../services/service-error'
import { ProviderUnavailableError } from '../../utils/errors'

/**
 * Maps a similarity provider failure to `ProviderUnavailableError` for the
 * given operation and record. Any other error is returned unchanged.
 */
export function asProviderFailure(
  error: unknown,
  operation: string,
  recordId: string
): unknown {
  if (isServiceError(error)) {
    return new ProviderUnavailableError(operation, recordId, error, {
      serviceCode: error.code,
    })
  }
  return error
}
