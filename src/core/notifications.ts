import {
  InvalidConfigError,
  InvalidParameterError,
  NotFoundError,
  ProviderUnavailableError,
} from '../utils/errors'

/**
 * A user-facing message describing a failed engine operation.
 */
export interface Notification {
  level: 'warning' | 'error'
  /** Error code, or `UNEXPECTED` for errors outside the engine taxonomy */
  code: string
  /** Operation that failed, e.g. `onRecordChanged` */
  operation: string
  /** Identifier of the affected record, when there is one */
  recordId?: string
  message: string
}

/**
 * Converts a failure into a notification that names the operation and the
 * affected identifier. Provider and store messages are never included.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.onRecordChanged('TEST_0001')
 * } catch (error) {
 *   ui.show(toNotification(error, 'onRecordChanged', 'TEST_0001'))
 * }
 * ```
 */
export function toNotification(
  error: unknown,
  operation: string,
  recordId?: string
): Notification {
  if (error instanceof ProviderUnavailableError) {
    const id = error.recordId || recordId
    return {
      level: 'error',
      code: error.code,
      operation,
      recordId: id,
      message: `${operation} failed for record '${id}': the similarity service is unavailable. The previous match result was kept; try again later.`,
    }
  }

  if (error instanceof NotFoundError) {
    return {
      level: 'warning',
      code: error.code,
      operation,
      recordId: error.recordId,
      message: `${operation} failed: ${error.entity} record '${error.recordId}' does not exist.`,
    }
  }

  if (error instanceof InvalidConfigError) {
    return {
      level: 'warning',
      code: error.code,
      operation,
      recordId,
      message: `${operation} rejected: ${error.message}.`,
    }
  }

  if (error instanceof InvalidParameterError) {
    return {
      level: 'warning',
      code: error.code,
      operation,
      recordId,
      message: `${operation} rejected: ${error.message}.`,
    }
  }

  return {
    level: 'error',
    code: 'UNEXPECTED',
    operation,
    recordId,
    message: recordId
      ? `${operation} failed for record '${recordId}'.`
      : `${operation} failed.`,
  }
}
