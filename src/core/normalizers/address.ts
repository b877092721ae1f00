import abbreviations from './data/address-abbreviations.json'
import { collapseWhitespace, fallbackForm, punctuationToSpace, stripDiacritics } from './basic'

/**
 * Abbreviation → expansion for every token kind an address may carry.
 * No expansion is itself a key, which keeps normalization idempotent.
 */
const EXPANSIONS: ReadonlyMap<string, string> = new Map<string, string>([
  ...Object.entries(abbreviations.streetTypes),
  ...Object.entries(abbreviations.directionals),
  ...Object.entries(abbreviations.unitTypes),
])

/**
 * Expands a single lowercased address token.
 *
 * @example
 * ```typescript
 * expandAddressToken('st')    // 'street'
 * expandAddressToken('blvd')  // 'boulevard'
 * expandAddressToken('main')  // 'main'
 * ```
 */
export function expandAddressToken(token: string): string {
  return EXPANSIONS.get(token) ?? token
}

/**
 * Normalizes a postal address for comparison.
 *
 * The value is lowercased, diacritics are removed, punctuation becomes
 * whitespace and street-type, directional and unit abbreviations are
 * expanded to their full words.
 *
 * @example
 * ```typescript
 * normalizeAddress('12 N. Main St., Apt 4')   // '12 north main street apartment 4'
 * normalizeAddress('12 North Main Street #4') // '12 north main street 4'
 * ```
 */
export function normalizeAddress(value: string): string {
  const cleaned = collapseWhitespace(
    punctuationToSpace(stripDiacritics(value.toLowerCase()).toLowerCase())
  )
  if (!cleaned) {
    return fallbackForm(value)
  }

  return cleaned.split(' ').map(expandAddressToken).join(' ')
}

/**
 * Normalizes a postal code: lowercased with spaces and hyphens removed.
 *
 * @example
 * ```typescript
 * normalizePostalCode('SW1A 1AA')   // 'sw1a1aa'
 * normalizePostalCode('90210-1234') // '902101234'
 * ```
 */
export function normalizePostalCode(value: string): string {
  const compact = value.toLowerCase().replace(/[\s-]+/g, '')
  return compact || fallbackForm(value)
}
