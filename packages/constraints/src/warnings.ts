/**
 * Diagnostics raised while building constraints.
 *
 * None of these change what a constraint matches. They let callers flag
 * requirement text that probably holds a typo.
 */

/**
 * Warning codes.
 */
export const WARNING_CODES = {
  /** Version text did not parse as a range and became a literal */
  LITERAL_FALLBACK: 'W101',
  /** Version text parsed as a range that admits no version */
  UNSATISFIABLE_RANGE: 'W102',
} as const

export type WarningCode = (typeof WARNING_CODES)[keyof typeof WARNING_CODES]

export interface ConstraintWarning {
  /** Warning code (e.g., "W101") */
  code: WarningCode
  /** Human-readable message */
  message: string
  /** Requirement text the warning is about */
  text: string
}

export type WarningHandler = (warning: ConstraintWarning) => void

export function literalFallbackWarning(text: string): ConstraintWarning {
  return {
    code: WARNING_CODES.LITERAL_FALLBACK,
    message: `"${text}" is not a valid version range; matching it as a literal version`,
    text,
  }
}

export function unsatisfiableRangeWarning(text: string): ConstraintWarning {
  return {
    code: WARNING_CODES.UNSATISFIABLE_RANGE,
    message: `"${text}" admits no version`,
    text,
  }
}

/**
 * Print a warning to the console.
 */
export function printWarning(warning: ConstraintWarning): void {
  console.warn(`[${warning.code}] ${warning.message}`)
}
