/**
 * Core types for verset
 */

// Version types
export type {
  BranchVersion,
  PairedVersion,
  PlainVersion,
  RevisionVersion,
  SemverVersion,
  UnpairedVersion,
  Version,
  VersionKind,
} from './version.js'

export {
  branch,
  branchFacet,
  formatVersion,
  literalFacet,
  pairVersion,
  parseVersion,
  plainVersion,
  revision,
  revisionFacet,
  semverFacet,
  semverVersion,
  unpairVersion,
} from './version.js'
