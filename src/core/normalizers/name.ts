import affixes from './data/name-affixes.json'
import { collapseWhitespace, fallbackForm, punctuationToSpace, stripDiacritics } from './basic'

const TITLES = new Set<string>(affixes.titles)
const SUFFIXES = new Set<string>(affixes.suffixes)

/**
 * Checks if a token is an honorific title (mr, dr, ...).
 */
export function isTitle(token: string): boolean {
  return TITLES.has(token)
}

/**
 * Checks if a token is a generational or academic suffix (jr, iii, phd, ...).
 */
export function isSuffix(token: string): boolean {
  return SUFFIXES.has(token)
}

/**
 * Normalizes a personal name for comparison.
 *
 * Diacritics are removed, the value is lowercased, apostrophes and periods are
 * dropped and any other punctuation becomes a space. Leading titles and
 * trailing suffixes are stripped while more than one token remains, so a name
 * that is nothing but an honorific keeps its last token.
 *
 * @example
 * ```typescript
 * normalizeName('Dr. Jane  O\'Brien-Smith, Jr.') // 'jane obrien smith'
 * normalizeName('MR. SMITH')                    // 'smith'
 * normalizeName('  Zoë ')                        // 'zoe'
 * ```
 */
export function normalizeName(value: string): string {
  const cleaned = collapseWhitespace(
    punctuationToSpace(stripDiacritics(value.toLowerCase()).toLowerCase().replace(/['\u2019.]/g, ''))
  )
  if (!cleaned) {
    return fallbackForm(value)
  }

  const tokens = cleaned.split(' ')
  while (tokens.length > 1 && isTitle(tokens[0])) {
    tokens.shift()
  }
  while (tokens.length > 1 && isSuffix(tokens[tokens.length - 1])) {
    tokens.pop()
  }

  return tokens.join(' ')
}
