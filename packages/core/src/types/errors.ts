/**
 * Error codes for pattern compilation failures.
 * @public
 */
export type PatternErrorCode =
  | 'UNEXPECTED_END' // Trailing backslash, or a token where the pattern should end
  | 'PARENTHESES_MISMATCH' // (abc without )
  | 'MISSING_CLOSING_CURLY' // {abc without }
  | 'DUPLICATE_NAME' // Two placeholders share a name
  | 'CAPTURING_GROUP' // (a(b)) - a custom regexp opens its own capture group
  | 'INVALID_REGEXP' // (?:a) - a custom regexp starts with ?, turning its wrapper into a modifier group
  | 'INVALID_OPTION' // delimiter or prefix is not a single character

/**
 * A pattern compilation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown by the throwing compile entry point.
 *
 * Carries the same fields as the {@link PatternError} it was created from,
 * plus the pattern source that failed.
 *
 * @public
 */
export class PatternSyntaxError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Pattern that failed to compile */
  readonly source: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number

  constructor(source: string, error: PatternError) {
    super(error.message)
    this.name = 'PatternSyntaxError'
    this.code = error.code
    this.source = source
    this.position = error.position
    this.length = error.length
  }
}
