/**
 * @verset/core
 *
 * Version family and typed errors shared by the verset packages.
 */

// Types
export * from './types/index.js'

// Errors
export {
  ConstraintError,
  isConstraintError,
  isVersetError,
  isVersionError,
  UnknownConstraintKindError,
  VersetError,
  VersionError,
  VersionParseError,
} from './errors.js'
