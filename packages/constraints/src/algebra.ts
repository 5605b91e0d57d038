/**
 * Constraint algebra: membership, intersection, compatibility, display.
 *
 * Intersection rules:
 * - UNIVERSAL is the identity on either side
 * - EMPTY absorbs on either side
 * - two ranges intersect interval-wise; no overlap is EMPTY
 * - two pins of the same variant agree only on an equal key
 * - any other pairing of variants is EMPTY
 *
 * All operations are pure. Operands are never modified, so a constraint can
 * be folded against many others.
 */

import {
  type Version,
  branchFacet,
  literalFacet,
  revisionFacet,
  semverFacet,
} from '@verset/core'
import {
  type Constraint,
  EMPTY,
  type RangeConstraint,
  UNIVERSAL,
  assertNever,
  isEmpty,
  rangeConstraint,
} from './constraint.js'
import { formatRange, intersectRanges, rangeContains, rangesEqual } from './range.js'

/**
 * Whether `version` is acceptable under `constraint`.
 * A version lacking the facet the constraint compares does not match.
 */
export function matches(constraint: Constraint, version: Version): boolean {
  switch (constraint.kind) {
    case 'universal':
      return true
    case 'empty':
      return false
    case 'range': {
      const sv = semverFacet(version)
      return sv !== undefined && rangeContains(constraint.intervals, sv)
    }
    case 'revision':
      return revisionFacet(version) === constraint.revision
    case 'branch':
      return branchFacet(version) === constraint.name
    case 'literal':
      return literalFacet(version) === constraint.text
    default:
      return assertNever(constraint, 'constraint')
  }
}

function intersectRangeConstraints(a: RangeConstraint, b: RangeConstraint): Constraint {
  const intervals = intersectRanges(a.intervals, b.intervals)
  return rangeConstraint(intervals, formatRange(intervals))
}

/**
 * Intersect two constraints. Never fails; disjoint constraints give EMPTY.
 */
export function intersect(a: Constraint, b: Constraint): Constraint {
  if (a.kind === 'universal') return b
  if (b.kind === 'universal') return a
  if (a.kind === 'empty' || b.kind === 'empty') return EMPTY

  switch (a.kind) {
    case 'range':
      return b.kind === 'range' ? intersectRangeConstraints(a, b) : EMPTY
    case 'revision':
      return b.kind === 'revision' && b.revision === a.revision ? a : EMPTY
    case 'branch':
      return b.kind === 'branch' && b.name === a.name ? a : EMPTY
    case 'literal':
      return b.kind === 'literal' && b.text === a.text ? a : EMPTY
    default:
      return assertNever(a, 'constraint')
  }
}

/**
 * Whether some version could satisfy both constraints.
 * Always recomputes the intersection.
 */
export function compatible(a: Constraint, b: Constraint): boolean {
  return !isEmpty(intersect(a, b))
}

/**
 * Fold constraints together, starting from UNIVERSAL.
 */
export function intersectAll(constraints: Iterable<Constraint>): Constraint {
  let result: Constraint = UNIVERSAL
  for (const constraint of constraints) {
    result = intersect(result, constraint)
    if (isEmpty(result)) break
  }
  return result
}

/**
 * Display form: `*` for universal, the empty string for empty, the range
 * expression for ranges, the bare key for pins and literals.
 */
export function toText(constraint: Constraint): string {
  switch (constraint.kind) {
    case 'universal':
      return '*'
    case 'empty':
      return ''
    case 'range':
      return constraint.text
    case 'revision':
      return constraint.revision
    case 'branch':
      return constraint.name
    case 'literal':
      return constraint.text
    default:
      return assertNever(constraint, 'constraint')
  }
}

/**
 * Structural equality. Ranges compare by their canonical interval lists, not
 * their text. Overlapping intervals are not merged, so two ranges admitting
 * the same versions through different decompositions (`1.x || >=1.5.0 <2.0.0`
 * and `1.x`) compare unequal.
 */
export function constraintsEqual(a: Constraint, b: Constraint): boolean {
  switch (a.kind) {
    case 'universal':
    case 'empty':
      return b.kind === a.kind
    case 'range':
      return b.kind === 'range' && rangesEqual(a.intervals, b.intervals)
    case 'revision':
      return b.kind === 'revision' && b.revision === a.revision
    case 'branch':
      return b.kind === 'branch' && b.name === a.name
    case 'literal':
      return b.kind === 'literal' && b.text === a.text
    default:
      return assertNever(a, 'constraint')
  }
}
