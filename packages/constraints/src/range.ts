/**
 * Semantic-version range arithmetic.
 *
 * A range is a union of intervals. Each interval has an optional lower and
 * upper bound. Range expressions are parsed with semver (comparator sets
 * joined by `||`); commas are accepted as AND, so `>=1.0.0,<2.0.0` and
 * `>=1.0.0 <2.0.0` are the same range.
 *
 * Prerelease policy follows semver.satisfies: a prerelease such as
 * 1.2.0-beta.1 is inside an interval only when one of that interval's bounds
 * is itself a prerelease of 1.2.0. Intervals are kept normalized so that the
 * bounds alone carry this information:
 * - a prerelease bound whose tuple is not admitted is rewritten to its
 *   release form (`>=1.2.0-beta` becomes `>=1.2.0`, `<2.0.0-0` becomes `<2.0.0`)
 * - an interval that admits no version is dropped
 */

import * as semver from 'semver'

export interface Bound {
  readonly version: semver.SemVer
  readonly inclusive: boolean
}

export interface Interval {
  readonly lower: Bound | undefined
  readonly upper: Bound | undefined
}

export interface RangeParseOptions {
  /** Use semver's loose parsing */
  loose?: boolean | undefined
}

// ============================================================================
// Bound helpers
// ============================================================================

function isPrerelease(v: semver.SemVer): boolean {
  return v.prerelease.length > 0
}

/** `major.minor.patch` of a version, without prerelease or build */
function releaseTuple(v: semver.SemVer): string {
  return `${v.major}.${v.minor}.${v.patch}`
}

function aboveLower(v: semver.SemVer, lower: Bound): boolean {
  const cmp = semver.compare(v, lower.version)
  return cmp > 0 || (cmp === 0 && lower.inclusive)
}

function belowUpper(v: semver.SemVer, upper: Bound): boolean {
  const cmp = semver.compare(v, upper.version)
  return cmp < 0 || (cmp === 0 && upper.inclusive)
}

function tighterLower(a: Bound | undefined, b: Bound | undefined): Bound | undefined {
  if (a === undefined) return b
  if (b === undefined) return a
  const cmp = semver.compare(a.version, b.version)
  if (cmp !== 0) return cmp > 0 ? a : b
  return a.inclusive ? b : a
}

function tighterUpper(a: Bound | undefined, b: Bound | undefined): Bound | undefined {
  if (a === undefined) return b
  if (b === undefined) return a
  const cmp = semver.compare(a.version, b.version)
  if (cmp !== 0) return cmp < 0 ? a : b
  return a.inclusive ? b : a
}

/** Tuples whose prereleases an interval admits */
function prereleaseTuples(interval: Interval): Set<string> {
  const tuples = new Set<string>()
  for (const bound of [interval.lower, interval.upper]) {
    if (bound !== undefined && isPrerelease(bound.version)) {
      tuples.add(releaseTuple(bound.version))
    }
  }
  return tuples
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Whether some prerelease of `tuple` lies between the bounds.
 */
function admitsPrereleaseOf(
  tuple: string,
  lower: Bound | undefined,
  upper: Bound | undefined
): boolean {
  // x.y.z-0 is the lowest prerelease of x.y.z
  let candidate = new semver.SemVer(`${tuple}-0`)
  if (lower !== undefined) {
    if (isPrerelease(lower.version) && releaseTuple(lower.version) === tuple) {
      candidate = lower.inclusive
        ? lower.version
        : new semver.SemVer(`${lower.version.version}.0`)
    } else if (!aboveLower(candidate, lower)) {
      return false
    }
  }
  return upper === undefined || belowUpper(candidate, upper)
}

/**
 * Whether some release (non-prerelease) version lies between the bounds.
 */
function admitsRelease(lower: Bound | undefined, upper: Bound | undefined): boolean {
  let candidate: semver.SemVer
  if (lower === undefined) {
    candidate = new semver.SemVer('0.0.0')
  } else if (isPrerelease(lower.version)) {
    candidate = new semver.SemVer(releaseTuple(lower.version))
  } else if (lower.inclusive) {
    candidate = lower.version
  } else {
    const v = lower.version
    candidate = new semver.SemVer(`${v.major}.${v.minor}.${v.patch + 1}`)
  }
  return upper === undefined || belowUpper(candidate, upper)
}

function normalizeInterval(
  lower: Bound | undefined,
  upper: Bound | undefined,
  allowed: ReadonlySet<string>
): Interval | null {
  const admitted = new Set<string>()
  for (const tuple of allowed) {
    if (admitsPrereleaseOf(tuple, lower, upper)) {
      admitted.add(tuple)
    }
  }

  let lo = lower
  if (lo !== undefined && isPrerelease(lo.version) && !admitted.has(releaseTuple(lo.version))) {
    lo = { version: new semver.SemVer(releaseTuple(lo.version)), inclusive: true }
  }
  let hi = upper
  if (hi !== undefined && isPrerelease(hi.version) && !admitted.has(releaseTuple(hi.version))) {
    hi = { version: new semver.SemVer(releaseTuple(hi.version)), inclusive: false }
  }

  if (admitted.size === 0 && !admitsRelease(lo, hi)) {
    return null
  }
  return { lower: lo, upper: hi }
}

function comparatorSetToInterval(comparators: readonly semver.Comparator[]): Interval | null {
  let lower: Bound | undefined
  let upper: Bound | undefined
  const allowed = new Set<string>()

  for (const comparator of comparators) {
    // Empty value is semver's ANY comparator (`*`)
    if (comparator.value === '') continue
    const v = comparator.semver
    if (isPrerelease(v)) {
      allowed.add(releaseTuple(v))
    }
    switch (comparator.operator) {
      case '>=':
        lower = tighterLower(lower, { version: v, inclusive: true })
        break
      case '>':
        lower = tighterLower(lower, { version: v, inclusive: false })
        break
      case '<=':
        upper = tighterUpper(upper, { version: v, inclusive: true })
        break
      case '<':
        upper = tighterUpper(upper, { version: v, inclusive: false })
        break
      case '':
      case '=':
        lower = tighterLower(lower, { version: v, inclusive: true })
        upper = tighterUpper(upper, { version: v, inclusive: true })
        break
    }
  }

  return normalizeInterval(lower, upper, allowed)
}

// ============================================================================
// Ordering
// ============================================================================

function compareLower(a: Bound | undefined, b: Bound | undefined): number {
  if (a === undefined || b === undefined) {
    return (a === undefined ? 0 : 1) - (b === undefined ? 0 : 1)
  }
  const cmp = semver.compare(a.version, b.version)
  if (cmp !== 0) return cmp
  return Number(!a.inclusive) - Number(!b.inclusive)
}

function compareUpper(a: Bound | undefined, b: Bound | undefined): number {
  if (a === undefined || b === undefined) {
    return (a === undefined ? 1 : 0) - (b === undefined ? 1 : 0)
  }
  const cmp = semver.compare(a.version, b.version)
  if (cmp !== 0) return cmp
  return Number(a.inclusive) - Number(b.inclusive)
}

function compareIntervals(a: Interval, b: Interval): number {
  return compareLower(a.lower, b.lower) || compareUpper(a.upper, b.upper)
}

/**
 * Sort intervals by lower then upper bound and drop duplicates.
 */
function canonicalize(intervals: Interval[]): Interval[] {
  const sorted = [...intervals].sort(compareIntervals)
  const result: Interval[] = []
  for (const interval of sorted) {
    const previous = result[result.length - 1]
    if (previous === undefined || compareIntervals(previous, interval) !== 0) {
      result.push(interval)
    }
  }
  return result
}

/**
 * Rewrite comma-joined operands as space-joined ones. Returns null when a
 * comma leaves an operand blank (`1.0.0,`, `>=1.0.0,,<2.0.0`).
 */
function joinAndOperands(text: string): string | null {
  const alternatives: string[] = []
  for (const alternative of text.split('||')) {
    const operands = alternative.split(',').map((operand) => operand.trim())
    if (operands.length > 1 && operands.some((operand) => operand === '')) {
      return null
    }
    alternatives.push(operands.join(' '))
  }
  return alternatives.join(' || ')
}

// ============================================================================
// Public operations
// ============================================================================

/**
 * Parse a range expression.
 *
 * Returns null when the text is not a range expression. A valid expression
 * that admits no version (e.g. `>=2.0.0 <1.0.0`) returns an empty list.
 */
export function parseRange(text: string, options: RangeParseOptions = {}): Interval[] | null {
  const normalized = joinAndOperands(text.trim())
  if (normalized === null) {
    return null
  }
  const semverOptions = { loose: options.loose ?? false }
  const valid = semver.validRange(normalized, semverOptions)
  if (valid === null) {
    return null
  }

  const range = new semver.Range(valid, semverOptions)
  const intervals: Interval[] = []
  for (const comparators of range.set) {
    const interval = comparatorSetToInterval(comparators)
    if (interval !== null) {
      intervals.push(interval)
    }
  }
  return canonicalize(intervals)
}

/**
 * Build the single-point interval for an exact version.
 */
export function exactInterval(version: semver.SemVer): Interval {
  const bound: Bound = { version, inclusive: true }
  return { lower: bound, upper: bound }
}

export function intervalContains(interval: Interval, version: semver.SemVer): boolean {
  if (interval.lower !== undefined && !aboveLower(version, interval.lower)) return false
  if (interval.upper !== undefined && !belowUpper(version, interval.upper)) return false
  if (!isPrerelease(version)) return true
  return prereleaseTuples(interval).has(releaseTuple(version))
}

export function rangeContains(intervals: readonly Interval[], version: semver.SemVer): boolean {
  return intervals.some((interval) => intervalContains(interval, version))
}

/**
 * Intersect two intervals. Returns null when nothing satisfies both.
 */
export function intersectIntervals(a: Interval, b: Interval): Interval | null {
  const tuplesB = prereleaseTuples(b)
  const allowed = new Set([...prereleaseTuples(a)].filter((tuple) => tuplesB.has(tuple)))
  return normalizeInterval(
    tighterLower(a.lower, b.lower),
    tighterUpper(a.upper, b.upper),
    allowed
  )
}

/**
 * Intersect two unions of intervals: every pairing of an interval from `a`
 * with one from `b`, keeping the non-empty results.
 *
 * An empty result means the ranges are disjoint.
 */
export function intersectRanges(a: readonly Interval[], b: readonly Interval[]): Interval[] {
  const intervals: Interval[] = []
  for (const left of a) {
    for (const right of b) {
      const interval = intersectIntervals(left, right)
      if (interval !== null) {
        intervals.push(interval)
      }
    }
  }
  return canonicalize(intervals)
}

function formatInterval(interval: Interval): string {
  const { lower, upper } = interval
  if (lower === undefined && upper === undefined) {
    return '*'
  }
  if (
    lower !== undefined &&
    upper !== undefined &&
    lower.inclusive &&
    upper.inclusive &&
    semver.compare(lower.version, upper.version) === 0
  ) {
    return lower.version.version
  }

  const parts: string[] = []
  if (lower !== undefined) {
    parts.push(`${lower.inclusive ? '>=' : '>'}${lower.version.version}`)
  }
  if (upper !== undefined) {
    parts.push(`${upper.inclusive ? '<=' : '<'}${upper.version.version}`)
  }
  return parts.join(' ')
}

/**
 * Canonical text for a union of intervals. The output parses back to the
 * same intervals.
 */
export function formatRange(intervals: readonly Interval[]): string {
  return intervals.map(formatInterval).join(' || ')
}

/**
 * Equality of canonical interval lists (sorted, de-duplicated, not merged).
 */
export function rangesEqual(a: readonly Interval[], b: readonly Interval[]): boolean {
  return (
    a.length === b.length &&
    a.every((interval, i) => {
      const other = b[i]
      return other !== undefined && compareIntervals(interval, other) === 0
    })
  )
}
