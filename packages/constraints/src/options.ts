/**
 * Options for building constraints.
 *
 * VERSET_WARNINGS=1 (or true) prints diagnostics to the console when the
 * caller passes no handler of its own. Without either, building stays silent.
 */

import { type WarningHandler, printWarning } from './warnings.js'

export interface ConstraintOptions {
  /** Parse range expressions in semver's loose mode */
  loose?: boolean | undefined
  /** Receives diagnostics such as the literal fallback */
  onWarning?: WarningHandler | undefined
}

export interface ResolvedConstraintOptions {
  loose: boolean
  onWarning: WarningHandler | undefined
}

/**
 * Whether the environment asks for console diagnostics.
 */
export function warningsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env['VERSET_WARNINGS']?.toLowerCase()
  return value === '1' || value === 'true'
}

export function resolveConstraintOptions(
  options: ConstraintOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConstraintOptions {
  return {
    loose: options.loose ?? false,
    onWarning: options.onWarning ?? (warningsEnabled(env) ? printWarning : undefined),
  }
}
