import { describe, it, expect } from 'vitest'
import { DEFAULT_CATCH_ALL, validateConfig } from '../../../src/builder/config-validator'
import { ConfigurationError } from '../../../src/utils/errors'

function validInput(): Record<string, unknown> {
  return {
    normalization: { phoneCountry: 'US' },
    blocking: {
      keys: [{ name: 'postal', parts: [{ field: 'postalCode', transform: 'identity' }] }],
    },
    scoring: {
      fields: [
        { field: 'name', metric: 'jaro-winkler', weight: 0.6 },
        { field: 'phone', metric: 'exact', weight: 0.4 },
      ],
    },
    thresholds: { low: 0.5, cluster: 0.7 },
    mode: 'merge',
    clustering: { seed: 42 },
  }
}

function expectConfigError(input: unknown, message: string): void {
  expect(() => validateConfig(input)).toThrow(ConfigurationError)
  expect(() => validateConfig(input)).toThrow(message)
}

describe('validateConfig', () => {
  it('fills in defaults for optional settings', () => {
    const config = validateConfig(validInput())

    expect(config.blocking.catchAll).toEqual(DEFAULT_CATCH_ALL)
    expect(config.scoring.missingFields).toBe('renormalize')
    expect(config.clustering).toEqual({ algorithm: 'louvain', seed: 42, resolution: 0.3 })
    expect(config.promoteSingletons).toBe(false)
    expect(config.canonicalPolicies).toEqual({})
    expect(config.normalization).toEqual({ phoneCountry: 'US' })
  })

  it('returns a deeply frozen configuration', () => {
    const config = validateConfig(validInput())

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.scoring.fields)).toBe(true)
    expect(Object.isFrozen(config.scoring.fields[0])).toBe(true)
    expect(Object.isFrozen(config.blocking.keys[0].parts)).toBe(true)
  })

  it('accepts weights that sum to 1 within floating point tolerance', () => {
    const input = validInput()
    input.scoring = {
      fields: [
        { field: 'name', metric: 'jaro-winkler', weight: 0.1 },
        { field: 'email', metric: 'exact', weight: 0.2 },
        { field: 'phone', metric: 'exact', weight: 0.7 },
      ],
    }

    expect(validateConfig(input).scoring.fields).toHaveLength(3)
  })

  it('rejects weights that do not sum to 1', () => {
    const input = validInput()
    input.scoring = {
      fields: [
        { field: 'name', metric: 'jaro-winkler', weight: 0.5 },
        { field: 'phone', metric: 'exact', weight: 0.3 },
      ],
    }

    expectConfigError(input, 'Scoring weights must sum to 1 (got 0.8)')
  })

  it('rejects a weight outside [0, 1]', () => {
    const input = validInput()
    input.scoring = { fields: [{ field: 'name', metric: 'exact', weight: 1.5 }] }

    expectConfigError(
      input,
      "Invalid parameter 'scoring.fields[0].weight': must be between 0 and 1 (inclusive)"
    )
  })

  it('rejects an unknown similarity metric', () => {
    const input = validInput()
    input.scoring = { fields: [{ field: 'name', metric: 'cosine', weight: 1 }] }

    expectConfigError(
      input,
      "Unknown similarity metric 'cosine'; expected one of: jaro-winkler, levenshtein, exact, token-overlap"
    )
  })

  it('rejects a field scored twice', () => {
    const input = validInput()
    input.scoring = {
      fields: [
        { field: 'name', metric: 'exact', weight: 0.5 },
        { field: 'name', metric: 'levenshtein', weight: 0.5 },
      ],
    }

    expectConfigError(input, "Field 'name' is scored more than once")
  })

  it('rejects an unknown field', () => {
    const input = validInput()
    input.scoring = { fields: [{ field: 'birthday', metric: 'exact', weight: 1 }] }

    expectConfigError(input, "Unknown field 'birthday'; use a core field or 'attributes.<key>'")
  })

  it('accepts attribute fields', () => {
    const input = validInput()
    input.scoring = { fields: [{ field: 'attributes.employer', metric: 'exact', weight: 1 }] }

    expect(validateConfig(input).scoring.fields[0].field).toBe('attributes.employer')
  })

  it('rejects a low threshold above the cluster threshold', () => {
    const input = validInput()
    input.thresholds = { low: 0.8, cluster: 0.7 }

    expectConfigError(input, 'thresholds.low (0.8) must not exceed thresholds.cluster (0.7)')
  })

  it('reports a missing threshold', () => {
    const input = validInput()
    input.thresholds = { low: 0.5 }

    expectConfigError(input, "Missing required parameter: 'thresholds.cluster'")
  })

  it('requires a resolution mode', () => {
    const input = validInput()
    delete input.mode

    expectConfigError(input, "Resolution mode must be set to 'merge' or 'link'")
  })

  it('rejects an unknown mode', () => {
    const input = validInput()
    input.mode = 'replace'

    expectConfigError(input, "Invalid parameter 'mode': must be one of: merge, link")
  })

  it('rejects an unknown block transform', () => {
    const input = validInput()
    input.blocking = { keys: [{ name: 'x', parts: [{ field: 'name', transform: 'metaphone' }] }] }

    expectConfigError(
      input,
      "Unknown block transform 'metaphone'; expected one of: identity, firstN, lastN, soundex"
    )
  })

  it('requires a positive length for firstN and lastN', () => {
    const input = validInput()
    input.blocking = { keys: [{ name: 'x', parts: [{ field: 'name', transform: 'firstN' }] }] }

    expectConfigError(input, "Missing required parameter: 'blocking.keys[0].parts[0].length'")

    input.blocking = {
      keys: [{ name: 'x', parts: [{ field: 'name', transform: 'lastN', length: 0 }] }],
    }
    expectConfigError(
      input,
      "Invalid parameter 'blocking.keys[0].parts[0].length': must be an integer >= 1"
    )
  })

  it('rejects duplicate block key names', () => {
    const input = validInput()
    const part = { field: 'postalCode', transform: 'identity' }
    input.blocking = {
      keys: [
        { name: 'postal', parts: [part] },
        { name: 'postal', parts: [part] },
      ],
    }

    expectConfigError(input, "Duplicate block key name 'postal'")
  })

  it('rejects a block key without parts', () => {
    const input = validInput()
    input.blocking = { keys: [{ name: 'empty', parts: [] }] }

    expectConfigError(input, 'blocking.keys[0].parts must be a non-empty array')
  })

  it('accepts an empty list of block keys', () => {
    const input = validInput()
    input.blocking = { keys: [] }

    expect(validateConfig(input).blocking.keys).toEqual([])
  })

  it('validates the catch-all settings', () => {
    const input = validInput()
    input.blocking = { keys: [], catchAll: { ceiling: 10, policy: 'sample', sampleSize: 5 } }
    expect(validateConfig(input).blocking.catchAll).toEqual({
      ceiling: 10,
      policy: 'sample',
      sampleSize: 5,
    })

    input.blocking = { keys: [], catchAll: { policy: 'ignore' } }
    expectConfigError(
      input,
      "Invalid parameter 'blocking.catchAll.policy': must be one of: proceed, sample, skip"
    )
  })

  it('requires a non-negative integer seed', () => {
    const input = validInput()
    input.clustering = { seed: 1.5 }

    expectConfigError(input, "Invalid parameter 'clustering.seed': must be an integer >= 0")
  })

  it('limits the seed to the range the generator distinguishes', () => {
    const input = validInput()
    input.clustering = { seed: 2 ** 31 }

    expectConfigError(input, "Invalid parameter 'clustering.seed': must be <= 2147483647")

    input.clustering = { seed: 2 ** 31 - 1 }
    expect(validateConfig(input).clustering.seed).toBe(2147483647)
  })

  it('requires a positive Louvain resolution', () => {
    const input = validInput()
    input.clustering = { seed: 1, resolution: 0 }

    expectConfigError(input, "Invalid parameter 'clustering.resolution': must be positive (> 0)")
  })

  it('rejects an unsupported phone country', () => {
    const input = validInput()
    input.normalization = { phoneCountry: 'XX' }

    expectConfigError(input, "Unsupported phone country 'XX'")
  })

  it('validates canonical policy overrides', () => {
    const input = validInput()
    input.canonicalPolicies = { address: 'plurality-or-most-complete' }
    expect(validateConfig(input).canonicalPolicies).toEqual({
      address: 'plurality-or-most-complete',
    })

    input.canonicalPolicies = { address: 'longest' }
    expectConfigError(
      input,
      "Invalid parameter 'canonicalPolicies.address': must be one of: plurality, plurality-or-most-complete"
    )
  })

  it('rejects a non-object configuration', () => {
    expectConfigError(null, "Invalid parameter 'config': must be a plain object")
  })

  it('records the offending setting on the error', () => {
    const input = validInput()
    input.thresholds = { low: 0.5, cluster: 2 }

    try {
      validateConfig(input)
      expect.fail('expected a ConfigurationError')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.field).toBe('thresholds.cluster')
        expect(error.code).toBe('CONFIGURATION_ERROR')
      }
    }
  })
})
