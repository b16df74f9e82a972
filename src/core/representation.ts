import type { RecordFields } from '../types/record'
import { normalizeWhitespace } from './normalizers/basic'

/** Field order of the concatenated representation */
export const REPRESENTATION_FIELDS = [
  'name',
  'addressLine1',
  'addressLine2',
  'city',
  'state',
  'postalCode',
  'country',
] as const satisfies ReadonlyArray<keyof RecordFields>

/**
 * Builds the text representation that is embedded and compared.
 *
 * Fields are joined in a fixed order with single spaces; empty or missing
 * fields are skipped. Reference and incoming records use the same rule, so
 * identical field values always produce identical text.
 *
 * @example
 * ```typescript
 * buildRepresentation({
 *   name: 'Alamo Elementary School',
 *   addressLine1: '12 Main St',
 *   city: 'Alamo',
 *   state: 'TX',
 * })
 * // 'Alamo Elementary School 12 Main St Alamo TX'
 * ```
 */
export function buildRepresentation(fields: RecordFields): string {
  const parts: string[] = []
  for (const field of REPRESENTATION_FIELDS) {
    const value = normalizeWhitespace(fields[field])
    if (value) {
      parts.push(value)
    }
  }
  return parts.join(' ')
}
