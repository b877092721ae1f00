import { describe, it, expect } from 'vitest'
import {
  ClusteringNondeterminismError,
  ConfigurationError,
  GraphDedupeError,
  InvalidParameterError,
  MalformedRecordError,
  MissingParameterError,
  PersistenceError,
  isGraphDedupeError,
  requireInRange,
  requireNonEmptyString,
  requireOneOf,
  requirePlainObject,
  requirePositive,
} from '../../../src/utils/errors'

describe('errors', () => {
  it('carries a code and context on every error', () => {
    const error = new ConfigurationError('bad thresholds', 'thresholds', { low: 0.9 })

    expect(error).toBeInstanceOf(GraphDedupeError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('ConfigurationError')
    expect(error.code).toBe('CONFIGURATION_ERROR')
    expect(error.context).toEqual({ field: 'thresholds', low: 0.9 })
  })

  it('formats malformed record messages with and without an id', () => {
    expect(new MalformedRecordError(2, 'record must be an object').message).toBe(
      'Malformed record at index 2: record must be an object'
    )
    expect(new MalformedRecordError(0, 'duplicate id', 'r1').message).toBe(
      "Malformed record at index 0 ('r1'): duplicate id"
    )
  })

  it('describes nondeterministic clustering', () => {
    const error = new ClusteringNondeterminismError('louvain', 42, 3, 2)

    expect(error.message).toBe(
      "Algorithm 'louvain' produced a different partition on run 2 of 3 with seed 42"
    )
    expect(error.context).toEqual({ algorithm: 'louvain', seed: 42, runs: 3, firstDivergentRun: 2 })
  })

  it('names the failed persistence operation', () => {
    const error = new PersistenceError('writeEdges', 'timeout')

    expect(error.message).toBe("Persistence failed during 'writeEdges': timeout")
    expect(error.operation).toBe('writeEdges')
  })

  it('recognizes its own errors', () => {
    expect(isGraphDedupeError(new MissingParameterError('seed'))).toBe(true)
    expect(isGraphDedupeError(new Error('plain'))).toBe(false)
  })
})

describe('validation helpers', () => {
  it('requirePositive', () => {
    expect(requirePositive(0.5, 'resolution')).toBe(0.5)
    expect(() => requirePositive(0, 'resolution')).toThrow(InvalidParameterError)
    expect(() => requirePositive(NaN, 'resolution')).toThrow('must be a number')
  })

  it('requireInRange', () => {
    expect(requireInRange(1, 0, 1, 'low')).toBe(1)
    expect(() => requireInRange(1.1, 0, 1, 'low')).toThrow(
      "Invalid parameter 'low': must be between 0 and 1 (inclusive)"
    )
  })

  it('requireNonEmptyString', () => {
    expect(requireNonEmptyString('louvain', 'algorithm')).toBe('louvain')
    expect(() => requireNonEmptyString('  ', 'algorithm')).toThrow('must not be empty')
    expect(() => requireNonEmptyString(3, 'algorithm')).toThrow('must be a string')
  })

  it('requireOneOf', () => {
    expect(requireOneOf('link', ['merge', 'link'] as const, 'mode')).toBe('link')
    expect(() => requireOneOf('x', ['merge', 'link'] as const, 'mode')).toThrow(
      'must be one of: merge, link'
    )
  })

  it('requirePlainObject', () => {
    expect(requirePlainObject({ a: 1 }, 'config')).toEqual({ a: 1 })
    expect(() => requirePlainObject([], 'config')).toThrow('must be a plain object')
  })
})
