import type { ThresholdConfig } from '../types/config'
import { InvalidConfigError } from '../utils/errors'

/**
 * Default cut points. These are tuning values for the embedding model in use,
 * not part of the classification contract.
 */
export const DEFAULT_THRESHOLDS: Readonly<ThresholdConfig> = Object.freeze({
  exact: 0.995,
  veryClose: 0.98,
  somewhatClose: 0.92,
})

const THRESHOLD_FIELDS = ['exact', 'veryClose', 'somewhatClose'] as const

/**
 * Validates a threshold configuration.
 *
 * @throws {InvalidConfigError} If a value is not a number in [0, 1] or the
 *   ordering `exact >= veryClose >= somewhatClose` does not hold
 */
export function validateThresholds(config: ThresholdConfig): void {
  for (const field of THRESHOLD_FIELDS) {
    const value = config[field]
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new InvalidConfigError(`${field} must be a number`, field, { value })
    }
    if (value < 0 || value > 1) {
      throw new InvalidConfigError(
        `${field} (${value}) must be between 0 and 1 (inclusive)`,
        field,
        { value }
      )
    }
  }

  if (config.exact < config.veryClose) {
    throw new InvalidConfigError(
      `exact (${config.exact}) must be greater than or equal to veryClose (${config.veryClose})`,
      'exact',
      { config }
    )
  }

  if (config.veryClose < config.somewhatClose) {
    throw new InvalidConfigError(
      `veryClose (${config.veryClose}) must be greater than or equal to somewhatClose (${config.somewhatClose})`,
      'veryClose',
      { config }
    )
  }
}

/**
 * Holds the process-wide threshold configuration.
 *
 * The value is replaced as a whole, never edited field by field, so readers
 * always see one complete configuration. Each replacement bumps `version`.
 */
export class ActiveThresholds {
  private current: Readonly<ThresholdConfig>
  private revision = 0

  constructor(initial: ThresholdConfig = DEFAULT_THRESHOLDS) {
    validateThresholds(initial)
    this.current = Object.freeze({ ...initial })
  }

  get value(): Readonly<ThresholdConfig> {
    return this.current
  }

  get version(): number {
    return this.revision
  }

  /**
   * Validates and installs a new configuration.
   *
   * @returns The version assigned to the new configuration
   * @throws {InvalidConfigError} If the configuration is invalid; the active
   *   value is left unchanged
   */
  replace(next: ThresholdConfig): number {
    validateThresholds(next)
    this.current = Object.freeze({
      exact: next.exact,
      veryClose: next.veryClose,
      somewhatClose: next.somewhatClose,
    })
    this.revision += 1
    return this.revision
  }
}
