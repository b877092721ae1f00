import { describe, it, expect } from 'vitest'
import {
  applyTransform,
  firstN,
  lastN,
  soundexTransform,
} from '../../../src/core/blocking/transforms'

describe('block key transforms', () => {
  describe('applyTransform', () => {
    it('returns the trimmed value for identity', () => {
      expect(applyTransform(' 20500 ', { field: 'postalCode', transform: 'identity' })).toBe(
        '20500'
      )
    })

    it('takes a prefix for firstN', () => {
      expect(applyTransform('jonathan', { field: 'name', transform: 'firstN', length: 3 })).toBe(
        'jon'
      )
    })

    it('takes a suffix for lastN', () => {
      expect(applyTransform('2025550123', { field: 'phone', transform: 'lastN', length: 4 })).toBe(
        '0123'
      )
    })

    it('encodes with soundex', () => {
      expect(applyTransform('jane smith', { field: 'name', transform: 'soundex' })).toBe('J525')
    })

    it('returns null for an empty value', () => {
      expect(applyTransform('   ', { field: 'name', transform: 'identity' })).toBeNull()
    })

    it('returns null for firstN without a length', () => {
      expect(applyTransform('jonathan', { field: 'name', transform: 'firstN' })).toBeNull()
    })
  })

  it('firstN and lastN return the whole value when it is shorter than n', () => {
    expect(firstN('ab', 5)).toBe('ab')
    expect(lastN('ab', 5)).toBe('ab')
  })

  it('soundexTransform returns null when there are no letters', () => {
    expect(soundexTransform('12345')).toBeNull()
    expect(soundexTransform('robert')).toBe('R163')
  })
})
