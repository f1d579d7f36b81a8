/**
 * Root error class and shared parameter guards
 * @module utils/errors
 */

/**
 * Base error class for every error raised by this library
 */
export class IpLookupError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'IpLookupError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends IpLookupError {
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

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is non-negative (>= 0)
 */
export function requireNonNegative(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a number is a whole count (0, 1, 2, ...) that survives JSON
 */
export function requireNonNegativeInteger(value: number, parameterName: string): number {
  requireNonNegative(value, parameterName)
  if (!Number.isSafeInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a non-negative integer'
    )
  }
  return value
}

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Check if an error was raised by this library
 */
export function isIpLookupError(error: unknown): error is IpLookupError {
  return error instanceof IpLookupError
}
