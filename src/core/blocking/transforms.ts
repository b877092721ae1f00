import type { BlockKeyPart } from '../../types/config'
import { soundexEncode } from '../comparators'

/**
 * Applies a key part's transformation to a normalized value.
 *
 * @returns Transformed string, or null when the value yields nothing usable
 */
export function applyTransform(value: string, part: BlockKeyPart): string | null {
  const str = value.trim()
  if (str.length === 0) return null

  switch (part.transform) {
    case 'identity':
      return str

    case 'firstN':
      return firstN(str, part.length ?? 0)

    case 'lastN':
      return lastN(str, part.length ?? 0)

    case 'soundex':
      return soundexTransform(str)

    default: {
      const _exhaustive: never = part.transform
      throw new Error(`Unknown transform: ${String(_exhaustive)}`)
    }
  }
}

/**
 * Extracts the first N characters of a value.
 */
export function firstN(value: string, n: number): string | null {
  if (n <= 0 || value.length === 0) return null
  return value.substring(0, n)
}

/**
 * Extracts the last N characters of a value.
 *
 * @example
 * ```typescript
 * lastN('2025550123', 4) // '0123'
 * ```
 */
export function lastN(value: string, n: number): string | null {
  if (n <= 0 || value.length === 0) return null
  return value.slice(-n)
}

/**
 * Encodes a value using Soundex.
 * Multi-word values are encoded as one run of letters, so the code follows the
 * first word.
 */
export function soundexTransform(value: string): string | null {
  const code = soundexEncode(value)
  return code || null
}
