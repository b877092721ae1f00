import { describe, it, expect } from 'vitest'
import { isSuffix, isTitle, normalizeName } from '../../../src/core/normalizers/name'

describe('normalizeName', () => {
  it('lowercases and collapses whitespace', () => {
    expect(normalizeName('  JOHN   Smith ')).toBe('john smith')
  })

  it('strips leading titles and trailing suffixes', () => {
    expect(normalizeName('Mr. Jonathan Smith')).toBe('jonathan smith')
    expect(normalizeName("Dr. Jane  O'Brien-Smith, Jr.")).toBe('jane obrien smith')
    expect(normalizeName('Prof. Dr. Ada Lovelace PhD')).toBe('ada lovelace')
  })

  it('keeps the last token of a name made only of affixes', () => {
    expect(normalizeName('MR. SMITH')).toBe('smith')
    expect(normalizeName('Dr.')).toBe('dr')
  })

  it('removes diacritics', () => {
    expect(normalizeName('  Zoë ')).toBe('zoe')
    expect(normalizeName('José Núñez')).toBe('jose nunez')
  })

  it('falls back to the lowercased trimmed form for punctuation-only input', () => {
    expect(normalizeName(' -- ')).toBe('--')
  })

  it('is idempotent', () => {
    const inputs = ['Mr. Jonathan Smith', "Dr. Jane  O'Brien-Smith, Jr.", ' -- ', 'Zoë']
    for (const input of inputs) {
      const once = normalizeName(input)
      expect(normalizeName(once)).toBe(once)
    }
  })
})

describe('name affixes', () => {
  it('recognizes titles and suffixes', () => {
    expect(isTitle('dr')).toBe(true)
    expect(isTitle('jane')).toBe(false)
    expect(isSuffix('iii')).toBe(true)
    expect(isSuffix('smith')).toBe(false)
  })
})
