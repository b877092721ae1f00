/**
 * Normalizes an email address: trimmed and lowercased.
 * Local part and domain are otherwise kept as written; there is no
 * plus-address or dot folding.
 *
 * @example
 * ```typescript
 * normalizeEmail('  Jane.Doe+News@Example.COM ') // 'jane.doe+news@example.com'
 * ```
 */
export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase()
}
