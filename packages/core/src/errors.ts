/**
 * Typed error classes for verset
 *
 * Error hierarchy:
 * - VersetError (base)
 *   - ConstraintError (constraint construction)
 *     - UnknownConstraintKindError (unrecognized constraint kind)
 *   - VersionError (version values)
 *     - VersionParseError (text is not a semantic version)
 *
 * Everything else in the algebra (malformed ranges, disjoint constraints,
 * missing facets) is a normal value, not an error.
 */

/** Base error class for all verset errors */
export class VersetError extends Error {
  readonly code: string

  constructor(message: string, code: string) {
    super(message)
    this.name = 'VersetError'
    this.code = code
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Constraint errors
// ============================================================================

/** Base class for constraint-related errors */
export class ConstraintError extends VersetError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'ConstraintError'
  }
}

/** Error thrown when a constraint is requested for a kind the factory does not know */
export class UnknownConstraintKindError extends ConstraintError {
  readonly kind: string
  readonly text: string

  constructor(kind: string, text: string) {
    super(`Unknown constraint kind "${kind}" for "${text}"`, 'UNKNOWN_CONSTRAINT_KIND')
    this.name = 'UnknownConstraintKindError'
    this.kind = kind
    this.text = text
  }
}

// ============================================================================
// Version errors
// ============================================================================

/** Base class for version-related errors */
export class VersionError extends VersetError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'VersionError'
  }
}

/** Error thrown when text that must be a semantic version does not parse */
export class VersionParseError extends VersionError {
  readonly input: string

  constructor(input: string) {
    super(`Invalid semantic version: "${input}"`, 'VERSION_PARSE_ERROR')
    this.name = 'VersionParseError'
    this.input = input
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isVersetError(error: unknown): error is VersetError {
  return error instanceof VersetError
}

export function isConstraintError(error: unknown): error is ConstraintError {
  return error instanceof ConstraintError
}

export function isVersionError(error: unknown): error is VersionError {
  return error instanceof VersionError
}
