/**
 * Small string helpers shared by the field normalizers.
 */

/**
 * Trims and collapses internal whitespace to single spaces.
 *
 * @example
 * ```typescript
 * collapseWhitespace('  hello   world  ') // 'hello world'
 * ```
 */
export function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ')
}

/**
 * Removes combining diacritical marks ('José' → 'Jose').
 */
export function stripDiacritics(value: string): string {
  return value.normalize('NFKD').replace(/[\u0300-\u036f]/g, '')
}

/**
 * Replaces every character that is not a letter, digit or whitespace with a space.
 */
export function punctuationToSpace(value: string): string {
  return value.replace(/[^\p{L}\p{N}\s]/gu, ' ')
}

/**
 * Keeps only ASCII digits.
 *
 * @example
 * ```typescript
 * digitsOnly('(202) 555-0123') // '2025550123'
 * ```
 */
export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '')
}

/**
 * Fallback form for input a normalizer cannot make sense of.
 */
export function fallbackForm(value: string): string {
  return collapseWhitespace(value.toLowerCase())
}

/**
 * Normalizer for free-form extension attributes.
 */
export function normalizeText(value: string): string {
  return fallbackForm(value)
}
