/**
 * Unified error codes for the Ensemble packages.
 *
 * Every code follows the `CATEGORY_DETAIL` convention so the category can be
 * recovered from the code alone (see {@link getErrorCategory}).
 *
 * @module @ensemble/core/error-codes
 */

export const ErrorCodes = {
  // Conductor declaration and wiring
  CONDUCTOR_MISSING_CAPABILITY: 'CONDUCTOR_MISSING_CAPABILITY',
  CONDUCTOR_INVALID_DECLARATION: 'CONDUCTOR_INVALID_DECLARATION',
  CONDUCTOR_SEALED: 'CONDUCTOR_SEALED',

  // Database
  DB_QUERY_FAILED: 'DB_QUERY_FAILED',
  DB_UNKNOWN: 'DB_UNKNOWN',

  // Constraint violations reported by the database
  VALIDATION_UNIQUE_VIOLATION: 'VALIDATION_UNIQUE_VIOLATION',
  VALIDATION_FOREIGN_KEY_VIOLATION: 'VALIDATION_FOREIGN_KEY_VIOLATION',
  VALIDATION_NOT_NULL_VIOLATION: 'VALIDATION_NOT_NULL_VIOLATION',
  VALIDATION_CHECK_VIOLATION: 'VALIDATION_CHECK_VIOLATION',

  // Records
  RECORD_NOT_FOUND: 'RECORD_NOT_FOUND'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export type ErrorCategory = 'CONDUCTOR' | 'DB' | 'VALIDATION' | 'RECORD' | 'UNKNOWN'

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCodes))

const CATEGORY_REGEX = /^(CONDUCTOR|DB|VALIDATION|RECORD)_[A-Z_]+$/

export function isValidErrorCode(code: string): code is ErrorCode {
  return KNOWN_CODES.has(code)
}

/**
 * Extract the category prefix of an error code.
 *
 * @example
 * ```typescript
 * getErrorCategory('CONDUCTOR_MISSING_CAPABILITY') // 'CONDUCTOR'
 * getErrorCategory('whatever') // 'UNKNOWN'
 * ```
 */
export function getErrorCategory(code: string): ErrorCategory {
  const match = CATEGORY_REGEX.exec(code)
  switch (match?.[1]) {
    case 'CONDUCTOR':
      return 'CONDUCTOR'
    case 'DB':
      return 'DB'
    case 'VALIDATION':
      return 'VALIDATION'
    case 'RECORD':
      return 'RECORD'
    default:
      return 'UNKNOWN'
  }
}
