/**
 * Central error classes and validation utilities for graph-dedupe
 * @module utils/errors
 */

/**
 * Base error class for all graph-dedupe errors
 */
export class GraphDedupeError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'GraphDedupeError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends GraphDedupeError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends GraphDedupeError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when a resolution configuration is invalid.
 * Always raised before any record is processed.
 */
export class ConfigurationError extends GraphDedupeError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error describing a record that cannot take part in a run.
 * These are collected as rejections, not thrown out of the resolver.
 */
export class MalformedRecordError extends GraphDedupeError {
  public readonly recordId?: string
  public readonly index: number

  constructor(
    index: number,
    reason: string,
    recordId?: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Malformed record at index ${index}${recordId !== undefined ? ` ('${recordId}')` : ''}: ${reason}`,
      'MALFORMED_RECORD',
      { index, recordId, reason, ...context }
    )
    this.name = 'MalformedRecordError'
    this.index = index
    this.recordId = recordId
  }
}

/**
 * Error thrown when repeated fixed-seed partitions of the same graph disagree
 */
export class ClusteringNondeterminismError extends GraphDedupeError {
  public readonly algorithm: string
  public readonly seed: number
  public readonly runs: number

  constructor(algorithm: string, seed: number, runs: number, firstDivergentRun: number) {
    super(
      `Algorithm '${algorithm}' produced a different partition on run ${firstDivergentRun} of ${runs} with seed ${seed}`,
      'CLUSTERING_NONDETERMINISM',
      { algorithm, seed, runs, firstDivergentRun }
    )
    this.name = 'ClusteringNondeterminismError'
    this.algorithm = algorithm
    this.seed = seed
    this.runs = runs
  }
}

/**
 * Error thrown on an invalid similarity graph mutation
 */
export class GraphMutationError extends GraphDedupeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'GRAPH_MUTATION_ERROR', context)
    this.name = 'GraphMutationError'
  }
}

/**
 * Error thrown when a sink fails to persist part of a result
 */
export class PersistenceError extends GraphDedupeError {
  public readonly operation: string

  constructor(operation: string, message: string, context?: Record<string, unknown>) {
    super(`Persistence failed during '${operation}': ${message}`, 'PERSISTENCE_ERROR', {
      operation,
      ...context,
    })
    this.name = 'PersistenceError'
    this.operation = operation
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value <= 0) {
    throw new InvalidParameterError(parameterName, value, 'must be positive (> 0)')
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(parameterName, value, 'must be a string')
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Validates that an object is a valid plain object (not null, not array)
 */
export function requirePlainObject(
  value: unknown,
  parameterName: string
): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a plain object')
  }
  return value
}

/**
 * Type guard for plain objects
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if an error is a graph-dedupe error
 */
export function isGraphDedupeError(error: unknown): error is GraphDedupeError {
  return error instanceof GraphDedupeError
}
