/**
 * Version types for verset
 *
 * A version of a dependency is one of:
 * - Revision: exact content/VCS identifier (`revision`)
 * - Branch: floating named reference whose commit may move (`branch`)
 * - Plain: unstructured text with no ordering (`plain`)
 * - Semver: parsed semantic version (`semver`)
 * - Pair: a revision known to correspond to one of the three unpaired
 *   named versions above (`pair`)
 *
 * Constraints never look at a Version directly. They ask for the facet they
 * understand, and a missing facet is `undefined`.
 */

import * as semver from 'semver'
import { VersionParseError } from '../errors.js'

/** Version type discriminator */
export type VersionKind = 'revision' | 'branch' | 'plain' | 'semver' | 'pair'

export interface RevisionVersion {
  readonly kind: 'revision'
  readonly revision: string
}

export interface BranchVersion {
  readonly kind: 'branch'
  readonly name: string
}

export interface PlainVersion {
  readonly kind: 'plain'
  readonly text: string
}

export interface SemverVersion {
  readonly kind: 'semver'
  readonly semver: semver.SemVer
}

/** Versions that can be annotated with a revision */
export type UnpairedVersion = BranchVersion | PlainVersion | SemverVersion

export interface PairedVersion {
  readonly kind: 'pair'
  readonly version: UnpairedVersion
  readonly revision: string
}

export type Version = RevisionVersion | UnpairedVersion | PairedVersion

// ============================================================================
// Constructors
// ============================================================================

export function revision(id: string): RevisionVersion {
  return { kind: 'revision', revision: id }
}

export function branch(name: string): BranchVersion {
  return { kind: 'branch', name }
}

export function plainVersion(text: string): PlainVersion {
  return { kind: 'plain', text }
}

/**
 * Build a semver version, throwing VersionParseError if `text` is not one.
 * Leading `v`/`=` are accepted the way semver.parse accepts them.
 */
export function semverVersion(text: string): SemverVersion {
  const parsed = semver.parse(text)
  if (parsed === null) {
    throw new VersionParseError(text)
  }
  return { kind: 'semver', semver: parsed }
}

/**
 * Parse a version tag: semver when it parses, plain text otherwise.
 */
export function parseVersion(text: string): SemverVersion | PlainVersion {
  const parsed = semver.parse(text)
  if (parsed === null) {
    return plainVersion(text)
  }
  return { kind: 'semver', semver: parsed }
}

export function pairVersion(version: UnpairedVersion, rev: string): PairedVersion {
  return { kind: 'pair', version, revision: rev }
}

// ============================================================================
// Facets
// ============================================================================

/**
 * The unpaired side of a pair, or the version itself.
 */
export function unpairVersion(v: Version): RevisionVersion | UnpairedVersion {
  return v.kind === 'pair' ? v.version : v
}

export function revisionFacet(v: Version): string | undefined {
  switch (v.kind) {
    case 'revision':
    case 'pair':
      return v.revision
    default:
      return undefined
  }
}

export function branchFacet(v: Version): string | undefined {
  const inner = unpairVersion(v)
  return inner.kind === 'branch' ? inner.name : undefined
}

export function semverFacet(v: Version): semver.SemVer | undefined {
  const inner = unpairVersion(v)
  return inner.kind === 'semver' ? inner.semver : undefined
}

export function literalFacet(v: Version): string | undefined {
  const inner = unpairVersion(v)
  return inner.kind === 'plain' ? inner.text : undefined
}

// ============================================================================
// Display
// ============================================================================

export function formatVersion(v: Version): string {
  switch (v.kind) {
    case 'revision':
      return v.revision
    case 'branch':
      return v.name
    case 'plain':
      return v.text
    case 'semver':
      return v.semver.version
    case 'pair':
      return `${formatVersion(v.version)} (${v.revision})`
  }
}
