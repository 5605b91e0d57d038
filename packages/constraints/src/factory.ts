/**
 * Constraint construction.
 *
 * WHY: Manifests declare a requirement as a kind plus a string. This is the
 * one place where that string is interpreted, and the one place that can
 * fail: an unknown kind is a caller bug and throws. Version text that is not
 * a range is still accepted, as a literal, since manifests may pin to tags
 * that are not semver.
 */

import { UnknownConstraintKindError, type Version } from '@verset/core'
import {
  type Constraint,
  assertNever,
  branchConstraint,
  literalConstraint,
  rangeConstraint,
  revisionConstraint,
} from './constraint.js'
import { type ConstraintOptions, resolveConstraintOptions } from './options.js'
import { exactInterval, parseRange } from './range.js'
import { literalFallbackWarning, unsatisfiableRangeWarning } from './warnings.js'

/** Requirement kinds a manifest can declare */
export const CONSTRAINT_KINDS = ['branch', 'revision', 'version'] as const

export type ConstraintKind = (typeof CONSTRAINT_KINDS)[number]

export function isConstraintKind(value: string): value is ConstraintKind {
  return CONSTRAINT_KINDS.some((kind) => kind === value)
}

/**
 * Build a constraint from a declared kind and its source text.
 *
 * @throws UnknownConstraintKindError if `kind` is not one of CONSTRAINT_KINDS
 */
export function buildConstraint(
  kind: string,
  text: string,
  options: ConstraintOptions = {}
): Constraint {
  if (!isConstraintKind(kind)) {
    throw new UnknownConstraintKindError(kind, text)
  }

  switch (kind) {
    case 'branch':
      return branchConstraint(text)
    case 'revision':
      return revisionConstraint(text)
    case 'version':
      return buildVersionConstraint(text, options)
    default:
      return assertNever(kind, 'constraint kind')
  }
}

function buildVersionConstraint(text: string, options: ConstraintOptions): Constraint {
  const { loose, onWarning } = resolveConstraintOptions(options)

  const intervals = parseRange(text, { loose })
  if (intervals === null) {
    onWarning?.(literalFallbackWarning(text))
    return literalConstraint(text)
  }

  const constraint = rangeConstraint(intervals, text.trim() || '*')
  if (constraint.kind === 'empty') {
    onWarning?.(unsatisfiableRangeWarning(text))
  }
  return constraint
}

/**
 * Pin a discovered version: the constraint that accepts exactly it.
 * A pair is pinned by its revision.
 */
export function constraintFromVersion(version: Version): Constraint {
  switch (version.kind) {
    case 'revision':
    case 'pair':
      return revisionConstraint(version.revision)
    case 'branch':
      return branchConstraint(version.name)
    case 'plain':
      return literalConstraint(version.text)
    case 'semver':
      return rangeConstraint([exactInterval(version.semver)], version.semver.version)
    default:
      return assertNever(version, 'version kind')
  }
}
