/**
 * String similarity functions used by the pair scorer.
 * Every function returns a score in [0, 1] and is symmetric in its arguments.
 * Inputs are expected to be normalized already.
 */

/**
 * Compares two strings for exact equality.
 *
 * @returns 1 if the strings are identical, 0 otherwise
 */
export function exactMatch(a: string, b: string): number {
  return a === b ? 1 : 0
}

/**
 * Calculates Levenshtein distance similarity between two strings.
 *
 * Levenshtein distance measures the minimum number of single-character edits
 * (insertions, deletions, or substitutions) required to transform one string
 * into another. The distance is normalized by the longer length.
 *
 * @example
 * ```typescript
 * levenshtein('hello', 'hello')  // 1.0
 * levenshtein('hello', 'hallo')  // 0.8
 * levenshtein('cat', 'category') // 0.375
 * ```
 */
export function levenshtein(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1
  if (a.length === 0 || b.length === 0) return 0
  if (a === b) return 1

  // Wagner-Fischer with a single rolling row
  const lenA = a.length
  const lenB = b.length
  let previous = Array.from({ length: lenB + 1 }, (_, j) => j)

  for (let i = 1; i <= lenA; i++) {
    const current = [i]
    for (let j = 1; j <= lenB; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      )
    }
    previous = current
  }

  return 1 - previous[lenB] / Math.max(lenA, lenB)
}

/**
 * Options for Jaro-Winkler similarity comparison.
 */
export interface JaroWinklerOptions {
  /** Prefix scaling factor (default: 0.1, range: 0-0.25) */
  prefixScale?: number
  /** Maximum prefix length to consider (default: 4) */
  maxPrefixLength?: number
}

/**
 * Calculates Jaro-Winkler similarity between two strings.
 *
 * Jaro-Winkler is optimized for short strings like names. It rewards common
 * prefixes and allows for character transpositions.
 *
 * The matching window is computed from the longer string, and transpositions
 * are counted over matched characters in order, which makes the score
 * symmetric.
 *
 * @example
 * ```typescript
 * jaroWinkler('martha', 'marhta') // ~0.961
 * jaroWinkler('dixon', 'dicksonx') // ~0.813
 * ```
 */
export function jaroWinkler(
  a: string,
  b: string,
  options: JaroWinklerOptions = {}
): number {
  const { prefixScale = 0.1, maxPrefixLength = 4 } = options

  if (a.length === 0 && b.length === 0) return 1
  if (a.length === 0 || b.length === 0) return 0
  if (a === b) return 1

  const jaro = calculateJaro(a, b)

  let prefixLength = 0
  for (let i = 0; i < Math.min(a.length, b.length, maxPrefixLength); i++) {
    if (a[i] === b[i]) {
      prefixLength++
    } else {
      break
    }
  }

  return jaro + prefixLength * prefixScale * (1 - jaro)
}

/**
 * Calculates base Jaro similarity between two strings.
 * @internal
 */
function calculateJaro(a: string, b: string): number {
  const lenA = a.length
  const lenB = b.length

  const matchWindow = Math.max(Math.floor(Math.max(lenA, lenB) / 2) - 1, 0)

  const matchedA: boolean[] = new Array<boolean>(lenA).fill(false)
  const matchedB: boolean[] = new Array<boolean>(lenB).fill(false)

  let matches = 0
  for (let i = 0; i < lenA; i++) {
    const start = Math.max(0, i - matchWindow)
    const end = Math.min(i + matchWindow + 1, lenB)

    for (let j = start; j < end; j++) {
      if (!matchedB[j] && a[i] === b[j]) {
        matchedA[i] = true
        matchedB[j] = true
        matches++
        break
      }
    }
  }

  if (matches === 0) return 0

  let transpositions = 0
  let k = 0
  for (let i = 0; i < lenA; i++) {
    if (matchedA[i]) {
      while (!matchedB[k]) k++
      if (a[i] !== b[k]) transpositions++
      k++
    }
  }

  // Jaro = (m/|a| + m/|b| + (m-t/2)/m) / 3
  return (matches / lenA + matches / lenB + (matches - transpositions / 2) / matches) / 3
}

/**
 * Jaccard overlap of the whitespace-separated token sets of two strings.
 *
 * @example
 * ```typescript
 * tokenOverlap('12 main street', '12 main street apartment 4') // 0.6
 * tokenOverlap('12 main street', '99 oak road')                // 0
 * ```
 */
export function tokenOverlap(a: string, b: string): number {
  const tokensA = new Set(a.split(/\s+/).filter(Boolean))
  const tokensB = new Set(b.split(/\s+/).filter(Boolean))

  if (tokensA.size === 0 && tokensB.size === 0) return 1
  if (tokensA.size === 0 || tokensB.size === 0) return 0

  let intersection = 0
  for (const token of tokensA) {
    if (tokensB.has(token)) intersection++
  }

  return intersection / (tokensA.size + tokensB.size - intersection)
}

/**
 * Encodes a name into its Soundex code.
 *
 * Soundex is a phonetic algorithm that encodes names by sound, grouping
 * similar-sounding names together. The code is a letter followed by three
 * digits.
 *
 * @example
 * ```typescript
 * soundexEncode('Robert') // 'R163'
 * soundexEncode('Rupert') // 'R163'
 * soundexEncode('Smyth')  // 'S530'
 * ```
 */
export function soundexEncode(name: string): string {
  const normalized = name.toUpperCase().replace(/[^A-Z]/g, '')
  if (normalized.length === 0) return ''

  const soundexMap: Record<string, string> = {
    B: '1',
    F: '1',
    P: '1',
    V: '1',
    C: '2',
    G: '2',
    J: '2',
    K: '2',
    Q: '2',
    S: '2',
    X: '2',
    Z: '2',
    D: '3',
    T: '3',
    L: '4',
    M: '5',
    N: '5',
    R: '6',
  }

  const firstLetter = normalized[0]
  let code = firstLetter
  let prevDigit = soundexMap[firstLetter] ?? ''

  for (let i = 1; i < normalized.length; i++) {
    const digit = soundexMap[normalized[i]]

    if (digit) {
      if (digit !== prevDigit) {
        code += digit
      }
      prevDigit = digit
    } else if (normalized[i] !== 'H' && normalized[i] !== 'W') {
      // Vowels and y separate equal codes; h and w do not
      prevDigit = ''
    }

    if (code.length >= 4) break
  }

  return (code + '000').substring(0, 4)
}
