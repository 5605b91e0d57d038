/**
 * Constraint types for verset
 *
 * A constraint describes which versions of one dependency are acceptable.
 * The set of variants is closed: every operation switches over `kind` and
 * the compiler checks that each switch handles all of them.
 *
 * - universal: no restriction (identity of intersection)
 * - empty: nothing acceptable (absorbing element of intersection)
 * - range: one or more semver intervals
 * - revision: exact revision pin
 * - branch: floating branch/tag name
 * - literal: raw text that did not parse as a range
 */

import type { Interval } from './range.js'

/** Constraint type discriminator */
export type ConstraintVariant = 'universal' | 'empty' | 'range' | 'revision' | 'branch' | 'literal'

export interface UniversalConstraint {
  readonly kind: 'universal'
}

export interface EmptyConstraint {
  readonly kind: 'empty'
}

export interface RangeConstraint {
  readonly kind: 'range'
  /** Non-empty, sorted, de-duplicated intervals */
  readonly intervals: readonly Interval[]
  /** Display form: the source expression, or the canonical form for computed ranges */
  readonly text: string
}

export interface RevisionConstraint {
  readonly kind: 'revision'
  readonly revision: string
}

export interface BranchConstraint {
  readonly kind: 'branch'
  readonly name: string
}

export interface LiteralConstraint {
  readonly kind: 'literal'
  readonly text: string
}

export type Constraint =
  | UniversalConstraint
  | EmptyConstraint
  | RangeConstraint
  | RevisionConstraint
  | BranchConstraint
  | LiteralConstraint

/** Matches every version */
export const UNIVERSAL: UniversalConstraint = Object.freeze({ kind: 'universal' })

/** Matches no version */
export const EMPTY: EmptyConstraint = Object.freeze({ kind: 'empty' })

export function isUniversal(c: Constraint): c is UniversalConstraint {
  return c.kind === 'universal'
}

export function isEmpty(c: Constraint): c is EmptyConstraint {
  return c.kind === 'empty'
}

/**
 * Compile-time exhaustiveness check for switches over a closed union.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`)
}

// ============================================================================
// Constructors
// ============================================================================

export function revisionConstraint(rev: string): RevisionConstraint {
  return { kind: 'revision', revision: rev }
}

export function branchConstraint(name: string): BranchConstraint {
  return { kind: 'branch', name }
}

export function literalConstraint(text: string): LiteralConstraint {
  return { kind: 'literal', text }
}

/**
 * Wrap intervals as a constraint. No intervals means no acceptable version,
 * which is always the EMPTY sentinel.
 */
export function rangeConstraint(
  intervals: readonly Interval[],
  text: string
): RangeConstraint | EmptyConstraint {
  if (intervals.length === 0) {
    return EMPTY
  }
  return { kind: 'range', intervals, text }
}
