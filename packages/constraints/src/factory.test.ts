/**
 * Tests for constraint construction.
 *
 * WHY: The factory is the only place requirement text is interpreted.
 * These tests verify each kind, the literal fallback, the unsatisfiable
 * range collapse, and the unknown-kind failure.
 */

import {
  UnknownConstraintKindError,
  branch,
  pairVersion,
  plainVersion,
  revision,
  semverVersion,
} from '@verset/core'
import { describe, expect, it, vi } from 'vitest'
import { matches, toText } from './algebra.js'
import { EMPTY } from './constraint.js'
import { buildConstraint, constraintFromVersion, isConstraintKind } from './factory.js'
import type { ConstraintWarning } from './warnings.js'

describe('buildConstraint', () => {
  it('should wrap a branch name verbatim', () => {
    expect(buildConstraint('branch', 'main')).toEqual({ kind: 'branch', name: 'main' })
  })

  it('should wrap a revision verbatim', () => {
    expect(buildConstraint('revision', 'abc123')).toEqual({ kind: 'revision', revision: 'abc123' })
  })

  it('should parse a version range', () => {
    const c = buildConstraint('version', '>=1.0.0,<2.0.0')
    expect(c.kind).toBe('range')
    expect(toText(c)).toBe('>=1.0.0,<2.0.0')
    expect(matches(c, semverVersion('1.2.0'))).toBe(true)
    expect(matches(c, semverVersion('2.0.0'))).toBe(false)
  })

  it('should fall back to a literal for non-range text', () => {
    const c = buildConstraint('version', 'not-a-semver-string')
    expect(c).toEqual({ kind: 'literal', text: 'not-a-semver-string' })
    expect(matches(c, plainVersion('not-a-semver-string'))).toBe(true)
    expect(matches(c, plainVersion('not-a-semver-string '))).toBe(false)
    expect(matches(c, branch('not-a-semver-string'))).toBe(false)
  })

  it('should fall back to a literal when a comma leaves an operand blank', () => {
    for (const text of [',,', '1.0.0,', '>=1.0.0,,<2.0.0']) {
      const onWarning = vi.fn<(warning: ConstraintWarning) => void>()
      const c = buildConstraint('version', text, { onWarning })
      expect(c).toEqual({ kind: 'literal', text })
      expect(matches(c, semverVersion('1.5.0'))).toBe(false)
      expect(onWarning).toHaveBeenCalledTimes(1)
      expect(onWarning).toHaveBeenCalledWith({
        code: 'W101',
        message: `"${text}" is not a valid version range; matching it as a literal version`,
        text,
      })
    }
  })

  it('should parse loose range syntax only when asked', () => {
    expect(buildConstraint('version', '1.2.3beta')).toEqual({ kind: 'literal', text: '1.2.3beta' })

    const c = buildConstraint('version', '1.2.3beta', { loose: true })
    expect(c.kind).toBe('range')
    expect(matches(c, semverVersion('1.2.3-beta'))).toBe(true)
    expect(matches(c, semverVersion('1.2.3'))).toBe(false)
  })

  it('should collapse an unsatisfiable range to EMPTY', () => {
    expect(buildConstraint('version', '>=2.0.0 <1.0.0')).toBe(EMPTY)
  })

  it('should throw for an unknown kind', () => {
    expect(() => buildConstraint('bogus-kind', 'x')).toThrow(UnknownConstraintKindError)
    expect(() => buildConstraint('bogus-kind', 'x')).toThrow(
      'Unknown constraint kind "bogus-kind" for "x"'
    )
  })

  describe('warnings', () => {
    it('should report the literal fallback', () => {
      const onWarning = vi.fn<(warning: ConstraintWarning) => void>()
      buildConstraint('version', 'not-a-semver-string', { onWarning })
      expect(onWarning).toHaveBeenCalledTimes(1)
      expect(onWarning).toHaveBeenCalledWith({
        code: 'W101',
        message: '"not-a-semver-string" is not a valid version range; matching it as a literal version',
        text: 'not-a-semver-string',
      })
    })

    it('should report an unsatisfiable range', () => {
      const onWarning = vi.fn<(warning: ConstraintWarning) => void>()
      buildConstraint('version', '>=2.0.0 <1.0.0', { onWarning })
      expect(onWarning).toHaveBeenCalledWith({
        code: 'W102',
        message: '">=2.0.0 <1.0.0" admits no version',
        text: '>=2.0.0 <1.0.0',
      })
    })

    it('should stay quiet for valid ranges and pins', () => {
      const onWarning = vi.fn<(warning: ConstraintWarning) => void>()
      buildConstraint('version', '^1.2.0', { onWarning })
      buildConstraint('branch', 'not a range', { onWarning })
      expect(onWarning).not.toHaveBeenCalled()
    })
  })
})

describe('isConstraintKind', () => {
  it('should accept the declared kinds only', () => {
    expect(isConstraintKind('branch')).toBe(true)
    expect(isConstraintKind('revision')).toBe(true)
    expect(isConstraintKind('version')).toBe(true)
    expect(isConstraintKind('bogus-kind')).toBe(false)
  })
})

describe('constraintFromVersion', () => {
  it('should pin a semver version to exactly that version', () => {
    const c = constraintFromVersion(semverVersion('1.2.3'))
    expect(toText(c)).toBe('1.2.3')
    expect(matches(c, semverVersion('1.2.3'))).toBe(true)
    expect(matches(c, semverVersion('1.2.4'))).toBe(false)
  })

  it('should pin a prerelease to exactly that prerelease', () => {
    const c = constraintFromVersion(semverVersion('2.0.0-rc.1'))
    expect(matches(c, semverVersion('2.0.0-rc.1'))).toBe(true)
    expect(matches(c, semverVersion('2.0.0-rc.2'))).toBe(false)
  })

  it('should pin a pair by its revision', () => {
    expect(constraintFromVersion(pairVersion(semverVersion('1.2.3'), 'abc123'))).toEqual({
      kind: 'revision',
      revision: 'abc123',
    })
  })

  it('should pin the remaining kinds by their key', () => {
    expect(constraintFromVersion(revision('abc123'))).toEqual({
      kind: 'revision',
      revision: 'abc123',
    })
    expect(constraintFromVersion(branch('main'))).toEqual({ kind: 'branch', name: 'main' })
    expect(constraintFromVersion(plainVersion('weird-tag'))).toEqual({
      kind: 'literal',
      text: 'weird-tag',
    })
  })
})
