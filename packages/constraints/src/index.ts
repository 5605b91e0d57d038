/**
 * @verset/constraints
 *
 * Constraint algebra for dependency-version resolution:
 * - Build constraints from declared requirements
 * - Test versions for membership
 * - Intersect constraints and test compatibility
 */

// Constraint types
export {
  assertNever,
  branchConstraint,
  EMPTY,
  isEmpty,
  isUniversal,
  literalConstraint,
  rangeConstraint,
  revisionConstraint,
  UNIVERSAL,
  type BranchConstraint,
  type Constraint,
  type ConstraintVariant,
  type EmptyConstraint,
  type LiteralConstraint,
  type RangeConstraint,
  type RevisionConstraint,
  type UniversalConstraint,
} from './constraint.js'

// Factory
export {
  buildConstraint,
  CONSTRAINT_KINDS,
  constraintFromVersion,
  isConstraintKind,
  type ConstraintKind,
} from './factory.js'

// Algebra
export {
  compatible,
  constraintsEqual,
  intersect,
  intersectAll,
  matches,
  toText,
} from './algebra.js'

// Range arithmetic
export {
  exactInterval,
  formatRange,
  intersectIntervals,
  intersectRanges,
  intervalContains,
  parseRange,
  rangeContains,
  rangesEqual,
  type Bound,
  type Interval,
  type RangeParseOptions,
} from './range.js'

// Options
export {
  resolveConstraintOptions,
  warningsEnabled,
  type ConstraintOptions,
  type ResolvedConstraintOptions,
} from './options.js'

// Warnings
export {
  literalFallbackWarning,
  printWarning,
  unsatisfiableRangeWarning,
  WARNING_CODES,
  type ConstraintWarning,
  type WarningCode,
  type WarningHandler,
} from './warnings.js'
