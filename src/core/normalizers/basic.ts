/**
 * Normalizes whitespace by collapsing multiple consecutive spaces into a single space
 * and trimming leading/trailing whitespace.
 *
 * @param value - The value to normalize
 * @returns String with normalized whitespace, or null if input is null/undefined
 *
 * @example
 * ```typescript
 * normalizeWhitespace('hello    world') // 'hello world'
 * normalizeWhitespace('hello\n\nworld') // 'hello world'
 * normalizeWhitespace(null) // null
 * ```
 */
export function normalizeWhitespace(value: unknown): string | null {
  if (value == null) return null
  return String(value).trim().replace(/\s+/g, ' ')
}
