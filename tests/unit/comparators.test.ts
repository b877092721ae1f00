import { describe, it, expect } from 'vitest'
import {
  exactMatch,
  jaroWinkler,
  levenshtein,
  soundexEncode,
  tokenOverlap,
} from '../../src/core/comparators'

describe('comparators', () => {
  describe('exactMatch', () => {
    it('returns 1 for identical strings and 0 otherwise', () => {
      expect(exactMatch('2025550143', '2025550143')).toBe(1)
      expect(exactMatch('2025550143', '2025550144')).toBe(0)
    })
  })

  describe('levenshtein', () => {
    it('normalizes edit distance by the longer length', () => {
      expect(levenshtein('hello', 'hello')).toBe(1)
      expect(levenshtein('hello', 'hallo')).toBeCloseTo(0.8, 10)
      expect(levenshtein('cat', 'category')).toBeCloseTo(0.375, 10)
    })

    it('handles empty strings', () => {
      expect(levenshtein('', '')).toBe(1)
      expect(levenshtein('abc', '')).toBe(0)
    })

    it('is symmetric', () => {
      expect(levenshtein('kitten', 'sitting')).toBe(levenshtein('sitting', 'kitten'))
    })
  })

  describe('jaroWinkler', () => {
    it('matches the classic reference values', () => {
      expect(jaroWinkler('martha', 'marhta')).toBeCloseTo(0.961111, 5)
      expect(jaroWinkler('dixon', 'dicksonx')).toBeCloseTo(0.813333, 5)
    })

    it('rewards shared prefixes on names', () => {
      expect(jaroWinkler('jon smith', 'john smith')).toBeCloseTo(0.973333, 5)
    })

    it('handles identical and empty strings', () => {
      expect(jaroWinkler('jane', 'jane')).toBe(1)
      expect(jaroWinkler('', '')).toBe(1)
      expect(jaroWinkler('jane', '')).toBe(0)
      expect(jaroWinkler('abc', 'xyz')).toBe(0)
    })

    it('is symmetric', () => {
      expect(jaroWinkler('dicksonx', 'dixon')).toBe(jaroWinkler('dixon', 'dicksonx'))
      expect(jaroWinkler('marhta', 'martha')).toBe(jaroWinkler('martha', 'marhta'))
    })

    it('stays within [0, 1]', () => {
      const score = jaroWinkler('aaaa', 'aaab', { prefixScale: 0.25 })
      expect(score).toBeGreaterThanOrEqual(0)
      expect(score).toBeLessThanOrEqual(1)
    })
  })

  describe('tokenOverlap', () => {
    it('computes the Jaccard overlap of whitespace tokens', () => {
      expect(tokenOverlap('12 main street', '12 main street apartment 4')).toBeCloseTo(0.6, 10)
      expect(tokenOverlap('12 main street', '99 oak road')).toBe(0)
      expect(tokenOverlap('main street', 'street main')).toBe(1)
    })

    it('handles empty strings', () => {
      expect(tokenOverlap('', '')).toBe(1)
      expect(tokenOverlap('main', '')).toBe(0)
    })
  })

  describe('soundexEncode', () => {
    it('groups similar-sounding names', () => {
      expect(soundexEncode('Robert')).toBe('R163')
      expect(soundexEncode('Rupert')).toBe('R163')
      expect(soundexEncode('Smyth')).toBe('S530')
      expect(soundexEncode('Smith')).toBe('S530')
    })

    it('collapses adjacent codes and pads to four characters', () => {
      expect(soundexEncode('Tymczak')).toBe('T522')
      expect(soundexEncode('Pfister')).toBe('P236')
      expect(soundexEncode('Lee')).toBe('L000')
    })

    it('does not let h or w separate letters with the same code', () => {
      expect(soundexEncode('Ashcraft')).toBe('A261')
      expect(soundexEncode('Ashcroft')).toBe('A261')
    })

    it('returns an empty string without letters', () => {
      expect(soundexEncode('123')).toBe('')
    })
  })
})
