import { describe, it, expect, vi } from 'vitest'
import { NormalizerRegistry, composeNormalizers } from '../../../src/core/normalizers/registry'
import { normalizeName } from '../../../src/core/normalizers/name'
import type { Logger } from '../../../src/utils/logger'

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

describe('NormalizerRegistry', () => {
  it('provides the built-in normalizers', () => {
    const registry = new NormalizerRegistry()

    expect(registry.list()).toEqual([
      { fieldType: 'name', custom: false },
      { fieldType: 'email', custom: false },
      { fieldType: 'phone', custom: false },
      { fieldType: 'address', custom: false },
      { fieldType: 'postalCode', custom: false },
      { fieldType: 'text', custom: false },
    ])
    expect(registry.apply('Mr. John Smith', 'name', {})).toBe('john smith')
  })

  it('replaces a normalizer on register', () => {
    const registry = new NormalizerRegistry()
    registry.register('email', (value) => value.trim().toLowerCase().replace(/\+[^@]*@/, '@'))

    expect(registry.apply('Jane+News@Mail.test', 'email', {})).toBe('jane@mail.test')
    expect(registry.list()).toContainEqual({ fieldType: 'email', custom: true })
  })

  it('warns when a custom normalizer is overwritten', () => {
    const logger = createMockLogger()
    const registry = new NormalizerRegistry(logger)

    registry.register('text', (value) => value)
    expect(logger.warn).not.toHaveBeenCalled()

    registry.register('text', (value) => value.toUpperCase())
    expect(logger.warn).toHaveBeenCalledWith(
      "Normalizer for 'text' is already registered. Overwriting."
    )
  })

  it('keeps registrations local to one registry', () => {
    const first = new NormalizerRegistry()
    const second = new NormalizerRegistry()
    first.register('name', () => 'custom')

    expect(first.apply('Jane', 'name', {})).toBe('custom')
    expect(second.apply('Jane', 'name', {})).toBe('jane')
  })

  it('falls back to the text form when a custom normalizer throws', () => {
    const logger = createMockLogger()
    const registry = new NormalizerRegistry(logger)
    registry.register('name', () => {
      throw new Error('boom')
    })

    expect(registry.apply('  Jane  DOE ', 'name', {})).toBe('jane doe')
    expect(logger.warn).toHaveBeenCalledWith("Normalizer for 'name' failed; using fallback form", {
      error: 'boom',
    })
  })
})

describe('composeNormalizers', () => {
  it('applies normalizers left to right', () => {
    const composed = composeNormalizers(normalizeName, (value) => value.replace(/ /g, '-'))
    expect(composed('Mr. John Smith', {})).toBe('john-smith')
  })
})
