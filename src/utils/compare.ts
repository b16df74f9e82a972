/**
 * Ordinal string comparison for identifiers, independent of locale.
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
